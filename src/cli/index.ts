#!/usr/bin/env node
import "dotenv/config";
import pino from "pino";
import { createLLMProvider, isProviderError } from "../providers/index.js";
import { USAGE, parseCliArgs } from "./args.js";

const logger = pino({ name: "streamchat-cli" });

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2), process.env["LLM_PROVIDER"]);

  if (!args) {
    console.error(USAGE);
    process.exit(1);
  }

  try {
    const llm = createLLMProvider(args.provider);
    logger.info({ provider: llm.name, stream: args.stream }, "sending prompt");

    if (!args.stream) {
      process.stdout.write(`${await llm.generate(args.prompt)}\n`);
      return;
    }

    const stream = llm.generateStream(args.prompt, {
      onComplete: (summary) => {
        if (!summary.sentinel) {
          logger.warn(summary, "stream ended without [DONE]");
        }
      },
    });
    for await (const delta of stream) {
      process.stdout.write(delta);
    }
    process.stdout.write("\n");
  } catch (error) {
    if (isProviderError(error)) {
      logger.error({ kind: error.kind, err: error }, "request failed");
    }
    const message = error instanceof Error ? error.message : "Unknown error";
    console.error(`\n❌ ${message}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "unexpected failure");
  process.exit(1);
});
