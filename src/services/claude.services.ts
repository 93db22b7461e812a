import Anthropic from "@anthropic-ai/sdk";
import {
  CLAUDE_MODEL_NAME,
  COMPLETION_TIMEOUT_MS,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
} from "../utils/constants";
import { CompletionError } from "../utils/errors";
import { describeError } from "../utils/logger";
import type { CompletionOptions, CompletionService } from "./llm.services";

/**
 * Service to generate completions with Anthropic's Messages API.
 */
export class ClaudeCompletionService implements CompletionService {
  readonly name = "claude";
  private client: Anthropic;

  constructor(
    apiKey: string,
    private readonly model: string = CLAUDE_MODEL_NAME,
    private readonly timeoutMs: number = COMPLETION_TIMEOUT_MS,
  ) {
    this.client = new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 1 });
  }

  async generate(prompt: string, options: CompletionOptions = {}): Promise<string> {
    let message: Anthropic.Message;
    try {
      message = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: options.temperature ?? DEFAULT_TEMPERATURE,
          messages: [{ role: "user", content: prompt }],
        },
        { timeout: options.timeoutMs ?? this.timeoutMs },
      );
    } catch (error) {
      throw new CompletionError(`Claude request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    const text = message.content
      .filter((block): block is Anthropic.TextBlock => block.type === "text")
      .map((block) => block.text)
      .join("")
      .trim();

    if (!text) {
      throw new CompletionError("Claude returned an empty response");
    }
    return text;
  }
}
