import { describe, it, expect, vi } from "vitest";
import { MockLLM } from "../../providers/mock-llm.js";

describe("MockLLM", () => {
  it("should echo the prompt", async () => {
    await expect(new MockLLM().generate("hello there")).resolves.toBe("[MockLLM] hello there");
  });

  it("should echo a long prompt in full", async () => {
    const prompt = "word ".repeat(100).trimEnd();
    await expect(new MockLLM().generate(prompt)).resolves.toBe(`[MockLLM] ${prompt}`);
  });

  it("should stream the same text word by word", async () => {
    const onDelta = vi.fn();
    const onComplete = vi.fn();
    const fragments: string[] = [];

    for await (const delta of new MockLLM().generateStream("hello there", { onDelta, onComplete })) {
      fragments.push(delta);
    }

    expect(fragments).toEqual(["[MockLLM] ", "hello ", "there"]);
    expect(onDelta).toHaveBeenCalledTimes(3);
    expect(onComplete).toHaveBeenCalledWith({ deltas: 3, characters: 21, sentinel: true });
  });

  it("should honour an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(new MockLLM().generate("hi", { signal: controller.signal })).rejects.toThrow();
  });
});
