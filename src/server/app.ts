import Fastify, { type FastifyReply } from "fastify";
import { isProviderError, type LLMProvider } from "../providers/index.js";
import { SseWriter } from "./sse-writer.js";

interface PromptBody {
  prompt: string;
}

const promptSchema = {
  body: {
    type: "object",
    required: ["prompt"],
    properties: {
      prompt: { type: "string" },
    },
  },
};

export function buildServer(options: { provider: LLMProvider; logger?: boolean }) {
  const fastify = Fastify({ logger: options.logger ?? true });
  const { provider } = options;

  // ── POST /generate ────────────────────────────────────────────────
  fastify.post<{ Body: PromptBody }>("/generate", {
    schema: promptSchema,
    handler: async (req, reply) => {
      try {
        const text = await provider.generate(req.body.prompt);
        return reply.code(200).send({ text });
      } catch (error) {
        req.log.warn({ err: error }, "generate failed");
        return sendError(reply, error);
      }
    },
  });

  // ── POST /generate/stream ─────────────────────────────────────────
  // Upstream failures before the first fragment keep their HTTP status;
  // after that they can only be reported as an `error` event.
  fastify.post<{ Body: PromptBody }>("/generate/stream", {
    schema: promptSchema,
    handler: async (req, reply) => {
      const abort = new AbortController();
      reply.raw.on("close", () => {
        if (!reply.raw.writableEnded) abort.abort();
      });

      const stream = provider.generateStream(req.body.prompt, {
        signal: abort.signal,
        onComplete: (summary) => {
          if (!summary.sentinel) {
            req.log.warn(summary, "upstream stream ended without [DONE]");
          }
        },
      });

      let step: IteratorResult<string, void>;
      try {
        step = await stream.next();
      } catch (error) {
        req.log.warn({ err: error }, "stream failed before first delta");
        return sendError(reply, error);
      }

      reply.hijack();
      const writer = new SseWriter(reply.raw);
      writer.open();
      try {
        while (!step.done) {
          writer.sendDelta(step.value);
          step = await stream.next();
        }
        writer.sendDone();
      } catch (error) {
        req.log.warn({ err: error }, "stream failed mid-sequence");
        writer.sendError(describeError(error));
      } finally {
        await stream.return();
        writer.end();
      }
    },
  });

  // ── Health check ──────────────────────────────────────────────────
  fastify.get("/health", async () => {
    return { status: "ok", provider: provider.name, timestamp: new Date().toISOString() };
  });

  return fastify;
}

function describeError(error: unknown): { kind: string; message: string } {
  if (isProviderError(error)) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: "internal", message: error instanceof Error ? error.message : "Unknown error" };
}

function sendError(reply: FastifyReply, error: unknown) {
  const body = describeError(error);
  if (!isProviderError(error)) {
    return reply.code(500).send({ error: body });
  }

  switch (error.kind) {
    case "configuration":
      return reply.code(500).send({ error: body });
    case "transport":
      return reply.code(504).send({ error: body });
    case "http_status":
      return reply.code(502).send({ error: { ...body, upstreamStatus: error.status } });
    case "protocol_decode":
      return reply.code(502).send({ error: body });
  }
}
