import type { GenerateOptions, LLMProvider, StreamOptions } from "./llm-provider.js";

/**
 * MockLLM – a deterministic provider that echoes the prompt.
 * Used for testing and offline development without any API keys.
 *
 * The streamed form yields the same text as `generate`, one word at a time.
 */
export class MockLLM implements LLMProvider {
  readonly name = "MockLLM/echo";
  readonly providerId = "mock";
  readonly model = "echo";

  async generate(prompt: string, options?: GenerateOptions): Promise<string> {
    options?.signal?.throwIfAborted();
    return this.reply(prompt);
  }

  async *generateStream(prompt: string, options: StreamOptions = {}): AsyncGenerator<string, void> {
    const fragments = this.reply(prompt).match(/\S+\s*/g) ?? [];
    let characters = 0;

    for (const fragment of fragments) {
      options.signal?.throwIfAborted();
      characters += fragment.length;
      options.onDelta?.(fragment);
      yield fragment;
    }

    options.onComplete?.({ deltas: fragments.length, characters, sentinel: true });
  }

  private reply(prompt: string): string {
    return `[MockLLM] ${prompt}`;
  }
}
