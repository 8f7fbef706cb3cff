export interface CliArgs {
  provider: string;
  stream: boolean;
  prompt: string;
}

export const USAGE = 'Usage: streamchat [--provider <id>] [--no-stream] "your prompt here"';

/** Returns null when the arguments cannot form a request. */
export function parseCliArgs(argv: string[], defaultProvider = "gpt"): CliArgs | null {
  let provider = defaultProvider;
  let stream = true;
  const words: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--no-stream") {
      stream = false;
    } else if (arg === "--provider" || arg === "-p") {
      const value = argv[i + 1];
      if (!value) return null;
      provider = value;
      i++;
    } else if (arg !== undefined) {
      words.push(arg);
    }
  }

  const prompt = words.join(" ");
  if (!prompt) return null;
  return { provider, stream, prompt };
}
