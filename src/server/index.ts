import "dotenv/config";
import { createLLMProvider } from "../providers/index.js";
import { buildServer } from "./app.js";

const PORT = parseInt(process.env["PORT"] ?? "3100", 10);
const HOST = process.env["HOST"] ?? "0.0.0.0";
const PROVIDER = process.env["LLM_PROVIDER"] ?? "gpt";

async function main(): Promise<void> {
  const provider = createLLMProvider(PROVIDER);
  const server = buildServer({ provider });

  try {
    await server.listen({ port: PORT, host: HOST });
    server.log.info(`streamchat relay for ${provider.name} on http://${HOST}:${PORT}`);
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`Failed to start server: ${message}`);
  process.exit(1);
});
