import { describe, it, expect } from "vitest";
import {
  ChatCompletionsLLM,
  ConfigurationError,
  EnvConfigStore,
  MockLLM,
  StaticConfigStore,
  createLLMProvider,
  listProviders,
} from "../../providers/index.js";
import { FakeTransport, completionBody } from "../helpers/fake-transport.js";

describe("createLLMProvider", () => {
  const store = new StaticConfigStore([
    { providerId: "gpt", apiKey: "test-key" },
    { providerId: "openrouter", apiKey: "test-key", modelName: "anthropic/claude-3.5-haiku" },
  ]);

  it("should return MockLLM for the mock provider without any config", () => {
    const llm = createLLMProvider("mock", { store: new StaticConfigStore([]) });
    expect(llm).toBeInstanceOf(MockLLM);
  });

  it("should return a chat-completions client for gpt", () => {
    const llm = createLLMProvider("gpt", { store });
    expect(llm).toBeInstanceOf(ChatCompletionsLLM);
    expect(llm.name).toBe("OpenAI/gpt-4-turbo");
  });

  it("should pass the configured model through", () => {
    const llm = createLLMProvider("openrouter", { store });
    expect(llm.name).toBe("OpenRouter/anthropic/claude-3.5-haiku");
  });

  it("should resolve through an EnvConfigStore", () => {
    const llm = createLLMProvider("openai", { store: new EnvConfigStore({ OPENAI_API_KEY: "test-key" }) });
    expect(llm.providerId).toBe("openai");
  });

  it("should reject unknown providers", () => {
    expect(() => createLLMProvider("gemini", { store })).toThrow(ConfigurationError);
    expect(() => createLLMProvider("toString", { store })).toThrow('Unknown provider "toString"');
  });

  it("should fail fast when the provider has no configuration", () => {
    expect(() => createLLMProvider("openai", { store })).toThrow('No configuration for provider "openai"');
  });

  it("should hand the transport to the client", async () => {
    const transport = new FakeTransport({ chunks: [completionBody("wired")] });
    const llm = createLLMProvider("gpt", { store, transport });

    await expect(llm.generate("hi")).resolves.toBe("wired");
    expect(transport.requests).toHaveLength(1);
  });
});

describe("listProviders", () => {
  it("should list every registered id", () => {
    expect(listProviders()).toEqual(["gpt", "openai", "openrouter", "mock"]);
  });
});
