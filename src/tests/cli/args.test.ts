import { describe, it, expect } from "vitest";
import { parseCliArgs } from "../../cli/args.js";

describe("parseCliArgs", () => {
  it("should join the remaining words into the prompt", () => {
    expect(parseCliArgs(["write", "a", "haiku"])).toEqual({
      provider: "gpt",
      stream: true,
      prompt: "write a haiku",
    });
  });

  it("should read --provider and --no-stream anywhere", () => {
    expect(parseCliArgs(["--no-stream", "hello", "--provider", "openrouter"])).toEqual({
      provider: "openrouter",
      stream: false,
      prompt: "hello",
    });
  });

  it("should accept -p and a custom default", () => {
    expect(parseCliArgs(["hi"], "mock")?.provider).toBe("mock");
    expect(parseCliArgs(["-p", "gpt", "hi"], "mock")?.provider).toBe("gpt");
  });

  it("should return null without a prompt", () => {
    expect(parseCliArgs([])).toBeNull();
    expect(parseCliArgs(["--no-stream"])).toBeNull();
  });

  it("should return null when --provider has no value", () => {
    expect(parseCliArgs(["hello", "--provider"])).toBeNull();
  });
});
