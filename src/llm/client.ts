import OpenAI from "openai";
import { GenerationServiceError } from "../errors";
import type { GenerationSettings } from "../config/settings";
import { errorMessage, fetchJson, withTimeout } from "../utils";

export interface CompletionOptions {
  system?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

/**
 * Text completion collaborator. Outputs are untrusted: callers clean and
 * validate them, and fall back to rule-based behaviour when a call fails.
 */
export interface GenerationService {
  readonly name: string;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

const DEFAULT_TEMPERATURE = 0.1;
const DEFAULT_MAX_TOKENS = 800;

export class OpenAIGenerationService implements GenerationService {
  readonly name = "openai";

  private readonly client: OpenAI;

  constructor(
    private readonly settings: { apiKey: string; model: string; baseUrl?: string; timeoutMs: number }
  ) {
    this.client = new OpenAI({
      apiKey: settings.apiKey,
      baseURL: settings.baseUrl,
      timeout: settings.timeoutMs,
      maxRetries: 1
    });
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (options.system) {
      messages.push({ role: "system", content: options.system });
    }
    messages.push({ role: "user", content: prompt });

    const response = await this.client.chat.completions.create(
      {
        model: this.settings.model,
        temperature: options.temperature ?? DEFAULT_TEMPERATURE,
        max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        messages
      },
      { timeout: options.timeoutMs ?? this.settings.timeoutMs }
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new GenerationServiceError("Model returned empty response");
    }
    return content;
  }
}

export class OllamaGenerationService implements GenerationService {
  readonly name = "ollama";

  constructor(private readonly settings: { baseUrl: string; model: string; timeoutMs: number }) {}

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const timeoutMs = options.timeoutMs ?? this.settings.timeoutMs;
    const url = new URL("/api/generate", this.settings.baseUrl).toString();

    let data: unknown;
    try {
      data = await fetchJson(
        url,
        {
          method: "POST",
          timeout: timeoutMs,
          data: {
            model: this.settings.model,
            prompt,
            system: options.system,
            stream: false,
            options: {
              temperature: options.temperature ?? DEFAULT_TEMPERATURE,
              num_predict: options.maxTokens ?? DEFAULT_MAX_TOKENS
            }
          }
        },
        { retries: 1, initialDelayMs: 250 },
        { failureThreshold: 3, cooldownMs: 30_000 }
      );
    } catch (error) {
      throw new GenerationServiceError(`Ollama request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!data || typeof data !== "object" || !("response" in data) || typeof data.response !== "string") {
      throw new GenerationServiceError("Ollama returned an unexpected payload");
    }
    return data.response.trim();
  }
}

export function createGenerationService(settings: GenerationSettings): GenerationService | null {
  switch (settings.provider) {
    case "openai":
      return new OpenAIGenerationService(settings);
    case "ollama":
      return new OllamaGenerationService(settings);
    case "none":
      return null;
  }
}

/** Runs a completion bounded by `timeoutMs`, whatever the back end does. */
export function completeWithin(
  service: GenerationService,
  prompt: string,
  timeoutMs: number,
  options: Omit<CompletionOptions, "timeoutMs"> = {}
): Promise<string> {
  return withTimeout(service.complete(prompt, { ...options, timeoutMs }), timeoutMs, `${service.name} completion`);
}
