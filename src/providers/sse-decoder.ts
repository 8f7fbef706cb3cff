import { ChatCompletionChunkSchema } from "./chat-completions.schema.js";
import type { StreamSummary } from "./llm-provider.js";

const DATA_PREFIX = "data: ";
const DONE_LINE = "data: [DONE]";

/**
 * Turns raw body chunks into complete lines.
 *
 * A line may arrive split across any number of reads, including in the
 * middle of a multi-byte character; nothing is emitted until its `\n` shows up.
 */
export class SSELineDecoder {
  private readonly decoder = new TextDecoder("utf-8");
  private buffer = "";

  push(chunk: Uint8Array): string[] {
    this.buffer += this.decoder.decode(chunk, { stream: true });
    const lines = this.buffer.split("\n");
    this.buffer = lines.pop() ?? "";
    return lines.map((line) => line.trimEnd());
  }

  /** Drain whatever is left once the body has ended. */
  flush(): string[] {
    const rest = (this.buffer + this.decoder.decode()).trimEnd();
    this.buffer = "";
    return rest ? [rest] : [];
  }
}

export type StreamLineEvent =
  | { type: "done" }
  | { type: "delta"; content: string }
  | { type: "skip"; reason: "not-data" | "invalid-json" | "no-content" };

/** Classify one already-reassembled line of the event stream. */
export function parseStreamLine(line: string): StreamLineEvent {
  if (line === DONE_LINE) {
    return { type: "done" };
  }
  if (!line.startsWith(DATA_PREFIX)) {
    return { type: "skip", reason: "not-data" };
  }

  let payload: unknown;
  try {
    payload = JSON.parse(line.slice(DATA_PREFIX.length));
  } catch {
    // Keep-alive noise and torn frames are dropped, never escalated.
    return { type: "skip", reason: "invalid-json" };
  }

  const chunk = ChatCompletionChunkSchema.safeParse(payload);
  const content = chunk.success ? chunk.data.choices[0]?.delta?.content : undefined;
  if (!content) {
    return { type: "skip", reason: "no-content" };
  }
  return { type: "delta", content };
}

/**
 * Decode a chat-completions event stream into text deltas.
 *
 * Stops reading at `data: [DONE]` even when more bytes follow. If the body
 * ends without the sentinel the generator simply returns, with
 * `sentinel: false` in the summary.
 */
export async function* decodeChatStream(
  chunks: AsyncIterable<Uint8Array>,
): AsyncGenerator<string, StreamSummary> {
  const decoder = new SSELineDecoder();
  const summary: StreamSummary = { deltas: 0, characters: 0, sentinel: false };

  for await (const chunk of chunks) {
    const finished = yield* emitLines(decoder.push(chunk), summary);
    if (finished) return summary;
  }

  yield* emitLines(decoder.flush(), summary);
  return summary;
}

function* emitLines(lines: string[], summary: StreamSummary): Generator<string, boolean> {
  for (const line of lines) {
    const event = parseStreamLine(line);
    if (event.type === "done") {
      summary.sentinel = true;
      return true;
    }
    if (event.type === "delta") {
      summary.deltas += 1;
      summary.characters += event.content.length;
      yield event.content;
    }
  }
  return false;
}
