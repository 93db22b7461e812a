import { z } from "zod";
import {
  COMPLETION_TIMEOUT_MS,
  DEFAULT_TEMPERATURE,
  OLLAMA_MODEL_NAME,
} from "../utils/constants";
import { CompletionError } from "../utils/errors";
import { describeError } from "../utils/logger";
import type { CompletionOptions, CompletionService } from "./llm.services";

const generateResponseSchema = z.object({
  response: z.string(),
});

/**
 * Service to generate completions with a local Ollama server.
 */
export class OllamaCompletionService implements CompletionService {
  readonly name = "ollama";
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly model: string = OLLAMA_MODEL_NAME,
    private readonly timeoutMs: number = COMPLETION_TIMEOUT_MS,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  /**
   * Calls `/api/generate` without streaming.
   *
   * @throws CompletionError on network errors, timeouts, non-2xx statuses and
   * bodies without a `response` string.
   */
  async generate(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    let body: unknown;
    try {
      const response = await fetch(`${this.baseUrl}/api/generate`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model: this.model,
          prompt,
          stream: false,
          options: {
            temperature: options.temperature ?? DEFAULT_TEMPERATURE,
            ...(options.maxTokens ? { num_predict: options.maxTokens } : {}),
          },
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new CompletionError(
          `Ollama returned ${response.status} ${response.statusText}`,
        );
      }
      body = await response.json();
    } catch (error) {
      if (error instanceof CompletionError) throw error;
      const reason = controller.signal.aborted
        ? `timed out after ${timeoutMs}ms`
        : describeError(error);
      throw new CompletionError(`Ollama request failed: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timer);
    }

    const parsed = generateResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CompletionError("Ollama response did not contain generated text");
    }
    return parsed.data.response.trim();
  }
}
