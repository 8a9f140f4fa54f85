import { describe, it, expect, vi } from "vitest";
import {
  AnthropicBackend,
  BackendError,
  createBackend,
  GoogleBackend,
  OllamaBackend,
  OpenAIBackend,
} from "../../agent/src/backends/index.js";
import { DEFAULT_CONFIG } from "../../runtime/src/config.js";

describe("createBackend", () => {
  it("builds an Ollama adapter with the configured model", () => {
    const backend = createBackend("ollama", DEFAULT_CONFIG);
    expect(backend).toBeInstanceOf(OllamaBackend);
    expect(backend.model).toBe("llama3.2");
  });

  it("lets an explicit model win over the configured one", () => {
    const backend = createBackend(
      "openai",
      { ...DEFAULT_CONFIG, openaiApiKey: "test-secret" },
      "gpt-test",
    );
    expect(backend).toBeInstanceOf(OpenAIBackend);
    expect(backend.model).toBe("gpt-test");
  });

  it("refuses cloud backends without an API key", () => {
    expect(() => createBackend("openai", DEFAULT_CONFIG)).toThrow(BackendError);
    expect(() => createBackend("anthropic", DEFAULT_CONFIG)).toThrow("ANTHROPIC_API_KEY is not set");
    expect(() => createBackend("google", DEFAULT_CONFIG)).toThrow("GOOGLE_API_KEY is not set");
  });

  it("builds the Google adapter once a key is configured", () => {
    const backend = createBackend("google", { ...DEFAULT_CONFIG, googleApiKey: "test-secret" });
    expect(backend).toBeInstanceOf(GoogleBackend);
    expect(backend.model).toBe("gemini-1.5-flash");
  });

  it("passes the configured temperature and token cap to the adapter", async () => {
    const fetchMock = vi.fn(
      async (_url: string, _init?: RequestInit): Promise<Response> =>
        new Response(JSON.stringify({ message: { content: "ok" }, done: true })),
    );
    vi.stubGlobal("fetch", fetchMock);
    const backend = createBackend("ollama", { ...DEFAULT_CONFIG, temperature: 0.1, maxTokens: 99 });

    await backend.send([{ role: "user", text: "Hi" }]);

    const body = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
    expect(body.options).toEqual({ temperature: 0.1, num_predict: 99 });
  });

  it("offers a fixed Anthropic model list", async () => {
    const backend = createBackend("anthropic", { ...DEFAULT_CONFIG, anthropicApiKey: "test-secret" });
    expect(backend).toBeInstanceOf(AnthropicBackend);
    await expect(backend.listModels()).resolves.toContain("claude-3-5-haiku-latest");
  });
});
