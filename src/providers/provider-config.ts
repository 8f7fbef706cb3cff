import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_TIMEOUT_MS = 60_000;

// ProxyAgent only speaks http(s) to the proxy.
function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

// ── ProviderConfig ────────────────────────────────────────────────────
export const ProviderConfigSchema = z.object({
  providerId: z.string().trim().min(1),
  apiKey: z.string().trim().min(1, "must be a non-empty string"),
  modelName: z.string().trim().min(1).optional(),
  proxyUrl: z.string().refine(isHttpUrl, "must be an http or https URL").optional(),
  timeoutMs: z.number().int().positive().optional(),
});
export type ProviderConfig = Readonly<z.infer<typeof ProviderConfigSchema>>;
export type ProviderConfigInput = z.input<typeof ProviderConfigSchema>;

/**
 * Validate a raw config and freeze it. Clients only ever hold the frozen copy.
 * Throws ConfigurationError listing every problem found.
 */
export function parseProviderConfig(input: unknown): ProviderConfig {
  const result = ProviderConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`,
    );
    throw new ConfigurationError("Invalid provider configuration", issues);
  }
  return Object.freeze(result.data);
}

// ── Config stores ─────────────────────────────────────────────────────
export interface ConfigStore {
  resolve(providerId: string): ProviderConfig;
}

/** Provider ids that also accept the conventional OPENAI_API_KEY. */
const OPENAI_KEY_ALIASES = new Set(["gpt", "openai"]);

/**
 * Reads provider settings from environment variables.
 *
 *   <ID>_API_KEY   required
 *   <ID>_MODEL     optional, provider default otherwise
 *   <ID>_PROXY     optional, falls back to HTTPS_PROXY / https_proxy
 *   LLM_TIMEOUT_MS optional, shared by all providers
 *
 * `<ID>` is the provider id upper-cased, e.g. `gpt` → `GPT_API_KEY`.
 */
export class EnvConfigStore implements ConfigStore {
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  resolve(providerId: string): ProviderConfig {
    const prefix = envPrefix(providerId);

    let apiKey = this.read(`${prefix}_API_KEY`);
    if (apiKey === undefined && OPENAI_KEY_ALIASES.has(providerId)) {
      apiKey = this.read("OPENAI_API_KEY");
    }

    const timeout = this.read("LLM_TIMEOUT_MS");

    return parseProviderConfig({
      providerId,
      apiKey,
      modelName: this.read(`${prefix}_MODEL`),
      proxyUrl:
        this.read(`${prefix}_PROXY`) ??
        this.read("HTTPS_PROXY") ??
        this.read("https_proxy"),
      timeoutMs: timeout === undefined ? undefined : Number(timeout),
    });
  }

  private read(key: string): string | undefined {
    const value = this.env[key]?.trim();
    return value ? value : undefined;
  }
}

/** A fixed in-memory store, handy for embedding and tests. */
export class StaticConfigStore implements ConfigStore {
  private readonly configs = new Map<string, ProviderConfig>();

  constructor(configs: ProviderConfigInput[]) {
    for (const config of configs) {
      const parsed = parseProviderConfig(config);
      this.configs.set(parsed.providerId, parsed);
    }
  }

  resolve(providerId: string): ProviderConfig {
    const config = this.configs.get(providerId);
    if (!config) {
      throw new ConfigurationError(`No configuration for provider "${providerId}"`);
    }
    return config;
  }
}

function envPrefix(providerId: string): string {
  return providerId.toUpperCase().replace(/[^A-Z0-9]+/g, "_");
}
