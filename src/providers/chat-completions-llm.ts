import { ChatCompletionSchema, type ChatCompletionRequestBody } from "./chat-completions.schema.js";
import {
  ConfigurationError,
  HttpStatusError,
  ProtocolDecodeError,
  TransportError,
  isProviderError,
} from "./errors.js";
import { UndiciTransport, type HttpResponse, type HttpTransport } from "./http-transport.js";
import type { GenerateOptions, LLMProvider, StreamOptions } from "./llm-provider.js";
import type { ProviderProfile } from "./profiles.js";
import {
  DEFAULT_TIMEOUT_MS,
  parseProviderConfig,
  type ProviderConfig,
  type ProviderConfigInput,
} from "./provider-config.js";
import { decodeChatStream } from "./sse-decoder.js";

export interface ChatCompletionsLLMOptions {
  transport?: HttpTransport;
}

/**
 * Chat-completions client – speaks the OpenAI wire format to whichever
 * endpoint its profile names (OpenAI, OpenRouter, ...).
 *
 * The config is validated here, so a missing API key fails at construction
 * and never reaches the network.
 */
export class ChatCompletionsLLM implements LLMProvider {
  readonly name: string;
  readonly providerId: string;
  readonly model: string;
  private readonly profile: ProviderProfile;
  private readonly config: ProviderConfig;
  private readonly transport: HttpTransport;

  constructor(
    profile: ProviderProfile,
    config: ProviderConfigInput,
    options?: ChatCompletionsLLMOptions,
  ) {
    this.config = parseProviderConfig(config);
    if (this.config.providerId !== profile.id) {
      throw new ConfigurationError(
        `Configuration for "${this.config.providerId}" cannot be bound to provider "${profile.id}"`,
      );
    }

    this.profile = profile;
    this.providerId = profile.id;
    this.model = this.config.modelName ?? profile.defaultModel;
    this.name = `${profile.label}/${this.model}`;
    this.transport = options?.transport ?? new UndiciTransport();
  }

  async generate(prompt: string, options?: GenerateOptions): Promise<string> {
    const response = await this.send(prompt, false, options?.signal);
    try {
      await this.assertSuccess(response);
      return parseCompletion(await this.readText(response));
    } finally {
      await response.close();
    }
  }

  async *generateStream(prompt: string, options: StreamOptions = {}): AsyncGenerator<string, void> {
    const response = await this.send(prompt, true, options.signal);
    const deltas = decodeChatStream(response.body);
    try {
      await this.assertSuccess(response);

      let step = await this.nextDelta(deltas);
      while (!step.done) {
        options.onDelta?.(step.value);
        yield step.value;
        step = await this.nextDelta(deltas);
      }
      options.onComplete?.(step.value);
    } finally {
      await deltas.return({ deltas: 0, characters: 0, sentinel: false });
      await response.close();
    }
  }

  private async send(prompt: string, stream: boolean, signal?: AbortSignal): Promise<HttpResponse> {
    const body: ChatCompletionRequestBody = {
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      stream,
    };

    try {
      return await this.transport.post({
        url: this.profile.endpoint,
        headers: {
          ...this.profile.headers,
          Authorization: `Bearer ${this.config.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
        proxyUrl: this.config.proxyUrl,
        timeoutMs: this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        signal,
      });
    } catch (error) {
      throw this.asTransportError(error);
    }
  }

  /** Reads the whole error body so the diagnostic text is kept verbatim. */
  private async assertSuccess(response: HttpResponse): Promise<void> {
    if (response.status >= 200 && response.status < 300) return;
    throw new HttpStatusError(response.status, await this.readText(response));
  }

  private async readText(response: HttpResponse): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      throw this.asTransportError(error);
    }
  }

  private async nextDelta<T>(iterator: AsyncIterator<string, T>): Promise<IteratorResult<string, T>> {
    try {
      return await iterator.next();
    } catch (error) {
      throw this.asTransportError(error);
    }
  }

  private asTransportError(error: unknown): Error {
    return isProviderError(error) ? error : new TransportError(this.profile.endpoint, error);
  }
}

function parseCompletion(raw: string): string {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    throw new ProtocolDecodeError("body is not valid JSON", raw);
  }

  const result = ChatCompletionSchema.safeParse(payload);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown shape";
    throw new ProtocolDecodeError(where, raw);
  }
  return result.data.choices[0].message.content;
}
