import { GoogleGenAI } from "@google/genai";
import {
  ANTHROPIC_API_KEY,
  COMPLETION_TIMEOUT_MS,
  DEFAULT_TEMPERATURE,
  GEMINI_API_KEY,
  GEMINI_MODEL_NAME,
  LLM_BACKEND,
  LLM_MODEL,
  OLLAMA_URL,
} from "../utils/constants";
import { CompletionError, ConfigurationError } from "../utils/errors";
import { describeError } from "../utils/logger";
import { ClaudeCompletionService } from "./claude.services";
import { OllamaCompletionService } from "./ollama.services";

export interface CompletionOptions {
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Stateless prompt-in, text-out contract every backend implements.
 * Implementations reject with CompletionError on transport or status failures.
 */
export interface CompletionService {
  readonly name: string;
  generate(prompt: string, options?: CompletionOptions): Promise<string>;
}

export type CompletionBackend = "gemini" | "ollama" | "claude";

const BACKEND_ALIASES: Record<string, CompletionBackend> = {
  gemini: "gemini",
  google: "gemini",
  ollama: "ollama",
  local: "ollama",
  mistral: "ollama",
  claude: "claude",
  anthropic: "claude",
};

export interface CompletionConfig {
  backend: string;
  model?: string;
  geminiApiKey?: string;
  anthropicApiKey?: string;
  ollamaUrl?: string;
  timeoutMs?: number;
}

/**
 * Resolves a configured backend name or alias.
 *
 * @throws ConfigurationError for unknown names.
 */
export function resolveBackend(name: string): CompletionBackend {
  const backend = BACKEND_ALIASES[name.trim().toLowerCase()];
  if (!backend) {
    throw new ConfigurationError(
      `Unknown LLM backend "${name}". Expected one of: ${Object.keys(BACKEND_ALIASES).join(", ")}`,
    );
  }
  return backend;
}

/**
 * Service to generate completions with Google Gemini.
 */
export class GeminiCompletionService implements CompletionService {
  readonly name = "gemini";
  private geminiClient: GoogleGenAI;

  constructor(
    apiKey: string,
    private readonly model: string = GEMINI_MODEL_NAME,
    private readonly timeoutMs: number = COMPLETION_TIMEOUT_MS,
  ) {
    this.geminiClient = new GoogleGenAI({ apiKey });
  }

  /**
   * Sends the prompt to the model and returns the trimmed response text.
   *
   * @throws CompletionError if the request fails or the model returns no text.
   */
  async generate(prompt: string, options: CompletionOptions = {}): Promise<string> {
    let text: string | undefined;
    try {
      const response = await this.geminiClient.models.generateContent({
        model: this.model,
        contents: prompt,
        config: {
          temperature: options.temperature ?? DEFAULT_TEMPERATURE,
          maxOutputTokens: options.maxTokens,
          httpOptions: { timeout: options.timeoutMs ?? this.timeoutMs },
        },
      });
      text = response?.text;
    } catch (error) {
      throw new CompletionError(`Gemini request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (!text) {
      throw new CompletionError("Gemini returned an empty response");
    }
    return text.trim();
  }
}

/**
 * Builds the completion service named by the configuration.
 *
 * @throws ConfigurationError for an unknown backend or a missing API key.
 */
export function createCompletionService(
  config: CompletionConfig = {
    backend: LLM_BACKEND,
    model: LLM_MODEL,
    geminiApiKey: GEMINI_API_KEY,
    anthropicApiKey: ANTHROPIC_API_KEY,
    ollamaUrl: OLLAMA_URL,
    timeoutMs: COMPLETION_TIMEOUT_MS,
  },
): CompletionService {
  const backend = resolveBackend(config.backend);
  const model = config.model || undefined;
  const timeoutMs = config.timeoutMs ?? COMPLETION_TIMEOUT_MS;

  switch (backend) {
    case "gemini":
      if (!config.geminiApiKey) {
        throw new ConfigurationError("GEMINI_API_KEY is required for the gemini backend");
      }
      return new GeminiCompletionService(config.geminiApiKey, model, timeoutMs);
    case "claude":
      if (!config.anthropicApiKey) {
        throw new ConfigurationError("ANTHROPIC_API_KEY is required for the claude backend");
      }
      return new ClaudeCompletionService(config.anthropicApiKey, model, timeoutMs);
    case "ollama":
      return new OllamaCompletionService(config.ollamaUrl || OLLAMA_URL, model, timeoutMs);
  }
}
