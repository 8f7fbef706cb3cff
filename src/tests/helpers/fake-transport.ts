import type { HttpRequest, HttpResponse, HttpTransport } from "../../providers/http-transport.js";

export interface FakeReply {
  status?: number;
  chunks?: Array<string | Uint8Array>;
  /** Thrown by `post` instead of answering. */
  error?: unknown;
  /** Body read fails after this many chunks. */
  failAfter?: number;
}

const encoder = new TextEncoder();

/**
 * In-process stand-in for the network. Records every request and counts
 * chunk reads and connection releases.
 */
export class FakeTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  reads = 0;
  closeCount = 0;
  private readonly replies: FakeReply[];

  constructor(...replies: FakeReply[]) {
    this.replies = replies;
  }

  async post(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (!reply) {
      throw new Error("FakeTransport: no reply queued");
    }
    if (reply.error !== undefined) {
      throw reply.error;
    }
    return new FakeResponse(this, reply);
  }
}

class FakeResponse implements HttpResponse {
  readonly status: number;
  private readonly transport: FakeTransport;
  private readonly chunks: Uint8Array[];
  private readonly failAfter: number | undefined;
  private closed = false;

  constructor(transport: FakeTransport, reply: FakeReply) {
    this.transport = transport;
    this.status = reply.status ?? 200;
    this.chunks = (reply.chunks ?? []).map((c) => (typeof c === "string" ? encoder.encode(c) : c));
    this.failAfter = reply.failAfter;
  }

  get body(): AsyncIterable<Uint8Array> {
    return this.read();
  }

  async text(): Promise<string> {
    return Buffer.concat(this.chunks).toString("utf-8");
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.transport.closeCount++;
  }

  private async *read(): AsyncGenerator<Uint8Array> {
    for (const [index, chunk] of this.chunks.entries()) {
      if (index === this.failAfter) {
        throw new Error("socket hang up");
      }
      this.transport.reads++;
      yield chunk;
    }
  }
}

/** One well-formed streaming line carrying `content`. */
export function deltaLine(content: string): string {
  return `data: ${JSON.stringify({ choices: [{ index: 0, delta: { content } }] })}\n`;
}

export function completionBody(content: string): string {
  return JSON.stringify({
    id: "chatcmpl-test",
    object: "chat.completion",
    choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }],
  });
}
