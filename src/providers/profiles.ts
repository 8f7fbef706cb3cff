/**
 * Wire-level facts about each chat-completions endpoint.
 * Everything provider-specific lives here, not in the client.
 */
export interface ProviderProfile {
  readonly id: string;
  readonly label: string;
  readonly endpoint: string;
  readonly defaultModel: string;
  readonly headers?: Readonly<Record<string, string>>;
}

const OPENAI_ENDPOINT = "https://api.openai.com/v1/chat/completions";

export const PROVIDER_PROFILES: Readonly<Record<string, ProviderProfile>> = {
  gpt: {
    id: "gpt",
    label: "OpenAI",
    endpoint: OPENAI_ENDPOINT,
    defaultModel: "gpt-4-turbo",
  },
  openai: {
    id: "openai",
    label: "OpenAI",
    endpoint: OPENAI_ENDPOINT,
    defaultModel: "gpt-4-turbo",
  },
  openrouter: {
    id: "openrouter",
    label: "OpenRouter",
    endpoint: "https://openrouter.ai/api/v1/chat/completions",
    defaultModel: "openai/gpt-4o-mini",
    headers: { "X-Title": "streamchat" },
  },
};

export function getProviderProfile(providerId: string): ProviderProfile | undefined {
  return Object.hasOwn(PROVIDER_PROFILES, providerId) ? PROVIDER_PROFILES[providerId] : undefined;
}
