import type { ServerResponse } from "node:http";

/**
 * SSE writer – frames relay events on a raw Node response.
 * Headers must be opened before the first event.
 */
export class SseWriter {
  private readonly res: ServerResponse;

  constructor(res: ServerResponse) {
    this.res = res;
  }

  open(): void {
    this.res.writeHead(200, {
      "Content-Type": "text/event-stream; charset=utf-8",
      "Cache-Control": "no-cache, no-transform",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
    });
  }

  sendDelta(delta: string): void {
    this.write(`data: ${JSON.stringify({ delta })}\n\n`);
  }

  sendError(payload: { kind: string; message: string }): void {
    this.write(`event: error\ndata: ${JSON.stringify(payload)}\n\n`);
  }

  sendDone(): void {
    this.write("data: [DONE]\n\n");
  }

  end(): void {
    if (!this.res.writableEnded) {
      this.res.end();
    }
  }

  // The client may have gone away mid-stream.
  private write(frame: string): void {
    if (!this.res.destroyed && !this.res.writableEnded) {
      this.res.write(frame);
    }
  }
}
