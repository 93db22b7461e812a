import { afterEach, describe, expect, it, vi } from "vitest";
import { CompletionError, ConfigurationError } from "../../utils/errors";
import { ClaudeCompletionService } from "../claude.services";
import {
  createCompletionService,
  GeminiCompletionService,
  resolveBackend,
} from "../llm.services";
import { OllamaCompletionService } from "../ollama.services";

describe("resolveBackend", () => {
  it("maps aliases to backends", () => {
    expect(resolveBackend("google")).toBe("gemini");
    expect(resolveBackend(" Local ")).toBe("ollama");
    expect(resolveBackend("mistral")).toBe("ollama");
    expect(resolveBackend("anthropic")).toBe("claude");
  });

  it("rejects unknown names", () => {
    expect(() => resolveBackend("gpt")).toThrow(ConfigurationError);
  });
});

describe("createCompletionService", () => {
  it("builds the configured backend", () => {
    expect(
      createCompletionService({ backend: "gemini", geminiApiKey: "test-secret" }),
    ).toBeInstanceOf(GeminiCompletionService);
    expect(
      createCompletionService({ backend: "claude", anthropicApiKey: "test-secret" }),
    ).toBeInstanceOf(ClaudeCompletionService);
    expect(createCompletionService({ backend: "ollama" })).toBeInstanceOf(
      OllamaCompletionService,
    );
  });

  it("requires API keys for hosted backends", () => {
    expect(() => createCompletionService({ backend: "gemini" })).toThrow(
      "GEMINI_API_KEY is required for the gemini backend",
    );
    expect(() => createCompletionService({ backend: "anthropic", anthropicApiKey: "" })).toThrow(
      "ANTHROPIC_API_KEY is required for the claude backend",
    );
  });
});

describe("OllamaCompletionService", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts a non-streaming generate request", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      new Response(JSON.stringify({ response: "  Tailored summary.  " }), { status: 200 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const service = new OllamaCompletionService("http://ollama.test:11434/", "mistral");
    await expect(service.generate("Hello", { maxTokens: 200 })).resolves.toBe(
      "Tailored summary.",
    );

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://ollama.test:11434/api/generate");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "mistral",
      prompt: "Hello",
      stream: false,
      options: { temperature: 0.3, num_predict: 200 },
    });
  });

  it("rejects non-2xx responses", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn<typeof fetch>(async () => new Response("boom", { status: 500, statusText: "Server Error" })),
    );

    const service = new OllamaCompletionService("http://ollama.test:11434");
    await expect(service.generate("Hello")).rejects.toThrow("Ollama returned 500 Server Error");
  });

  it("rejects bodies without generated text", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn<typeof fetch>(async () => new Response(JSON.stringify({ done: true }), { status: 200 })),
    );

    const service = new OllamaCompletionService("http://ollama.test:11434");
    await expect(service.generate("Hello")).rejects.toBeInstanceOf(CompletionError);
  });

  it("aborts requests that exceed the timeout", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn<typeof fetch>(
        (_url, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
          }),
      ),
    );

    const service = new OllamaCompletionService("http://ollama.test:11434", "mistral", 20);
    await expect(service.generate("Hello")).rejects.toThrow(
      "Ollama request failed: timed out after 20ms",
    );
  });
});
