import { z } from "zod";

// ── Request ───────────────────────────────────────────────────────────
export interface ChatCompletionRequestBody {
  model: string;
  messages: Array<{ role: "user"; content: string }>;
  stream: boolean;
}

// ── Buffered response envelope ────────────────────────────────────────
export const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .nonempty(),
});
export type ChatCompletion = z.infer<typeof ChatCompletionSchema>;

// ── Streaming chunk (one `data:` line) ────────────────────────────────
// Every field is optional here; a chunk without content is skipped.
export const ChatCompletionChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullish(),
          })
          .nullish(),
      }),
    )
    .min(1),
});
export type ChatCompletionChunk = z.infer<typeof ChatCompletionChunkSchema>;
