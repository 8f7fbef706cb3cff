/**
 * LLMProvider interface – the capability every provider variant exposes.
 * Wire-format quirks stay inside the variant; callers only see text.
 */
export interface LLMProvider {
  readonly name: string;
  readonly providerId: string;
  readonly model: string;

  /**
   * Send the prompt and wait for the whole completion.
   * Rejects with a ProviderError subclass.
   */
  generate(prompt: string, options?: GenerateOptions): Promise<string>;

  /**
   * Send the prompt and yield text fragments as they arrive.
   * Forward-only and single-pass. Breaking out of the loop releases the
   * connection; fragments already yielded stand if a later read fails.
   */
  generateStream(prompt: string, options?: StreamOptions): AsyncGenerator<string, void>;
}

export interface GenerateOptions {
  signal?: AbortSignal;
}

export interface StreamOptions extends GenerateOptions {
  /** Push-style tap, called with each fragment right before it is yielded. */
  onDelta?: (delta: string) => void;
  /** Called once when the stream ends normally (not on error or abandonment). */
  onComplete?: (summary: StreamSummary) => void;
}

export interface StreamSummary {
  deltas: number;
  characters: number;
  /** False when the transport closed before `data: [DONE]` arrived. */
  sentinel: boolean;
}
