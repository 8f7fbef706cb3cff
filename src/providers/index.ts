/**
 * Provider factory – picks the client variant for a provider id.
 *
 *   gpt / openai → ChatCompletionsLLM against api.openai.com
 *   openrouter   → ChatCompletionsLLM against openrouter.ai
 *   mock         → MockLLM (offline, no key)
 *
 * Usage:
 *   import { createLLMProvider } from "../providers/index.js";
 *   const llm = createLLMProvider("gpt");
 */
export { ChatCompletionsLLM } from "./chat-completions-llm.js";
export { MockLLM } from "./mock-llm.js";
export * from "./errors.js";
export type { GenerateOptions, LLMProvider, StreamOptions, StreamSummary } from "./llm-provider.js";
export {
  EnvConfigStore,
  StaticConfigStore,
  parseProviderConfig,
  type ConfigStore,
  type ProviderConfig,
} from "./provider-config.js";
export { PROVIDER_PROFILES, type ProviderProfile } from "./profiles.js";
export { UndiciTransport, type HttpTransport } from "./http-transport.js";

import pino from "pino";
import { ChatCompletionsLLM } from "./chat-completions-llm.js";
import { ConfigurationError } from "./errors.js";
import type { HttpTransport } from "./http-transport.js";
import type { LLMProvider } from "./llm-provider.js";
import { MockLLM } from "./mock-llm.js";
import { PROVIDER_PROFILES, getProviderProfile } from "./profiles.js";
import { EnvConfigStore, type ConfigStore } from "./provider-config.js";

const logger = pino({ name: "provider-factory" });

export const MOCK_PROVIDER_ID = "mock";

export function listProviders(): string[] {
  return [...Object.keys(PROVIDER_PROFILES), MOCK_PROVIDER_ID];
}

export function createLLMProvider(
  providerId: string,
  options?: { store?: ConfigStore; transport?: HttpTransport },
): LLMProvider {
  if (providerId === MOCK_PROVIDER_ID) {
    return new MockLLM();
  }

  const profile = getProviderProfile(providerId);
  if (!profile) {
    throw new ConfigurationError(`Unknown provider "${providerId}"`, [
      `expected one of: ${listProviders().join(", ")}`,
    ]);
  }

  const store = options?.store ?? new EnvConfigStore();
  const config = store.resolve(providerId);
  const llm = new ChatCompletionsLLM(profile, config, { transport: options?.transport });

  logger.debug(
    { providerId, model: llm.model, proxied: config.proxyUrl !== undefined },
    "LLM provider created",
  );
  return llm;
}
