import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError,
  type GenerativeModel,
} from "@google/generative-ai";
import type { PostTone } from "@postroom/shared";
import { ProviderError, isRetryableStatus } from "@postroom/lifecycle";
import { buildPostPrompt, buildRevisionPrompt } from "./prompts.js";
import type { TextGenerationOptions, TextGenerator } from "./types.js";

export interface GeminiTextGeneratorOptions {
  apiKey: string;
  model: string;
  maxLength: number;
  temperature?: number;
}

/**
 * Translate SDK failures into ProviderError so the orchestrator's retry policy
 * can tell rate limits and outages from rejected prompts.
 */
export function toProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;
  if (error instanceof GoogleGenerativeAIFetchError) {
    const status = error.status;
    return new ProviderError(error.message, {
      status,
      retryable: status === undefined ? true : isRetryableStatus(status),
      cause: error,
    });
  }
  if (error instanceof GoogleGenerativeAIResponseError) {
    // Blocked or malformed candidate; asking again with the same prompt won't help.
    return new ProviderError(error.message, { retryable: false, cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError(message, { retryable: true, cause: error });
}

/** Post text from Google Gemini. */
export class GeminiTextGenerator implements TextGenerator {
  private readonly model: GenerativeModel;

  constructor(private readonly options: GeminiTextGeneratorOptions) {
    const client = new GoogleGenerativeAI(options.apiKey);
    this.model = client.getGenerativeModel({
      model: options.model,
      generationConfig: {
        temperature: options.temperature ?? 0.8,
      },
    });
  }

  async generate(
    subject: string,
    tone: PostTone,
    options: TextGenerationOptions,
  ): Promise<string> {
    const promptInput = {
      subject,
      tone,
      maxLength: options.maxLength ?? this.options.maxLength,
      includeEmoji: options.includeEmoji ?? true,
    };
    const prompt = options.previousText
      ? buildRevisionPrompt({
          ...promptInput,
          previousText: options.previousText,
          instruction: options.instruction,
        })
      : buildPostPrompt(promptInput);

    let text: string;
    try {
      const result = await this.model.generateContent(prompt, { signal: options.signal });
      text = result.response.text().trim();
    } catch (error) {
      throw toProviderError(error);
    }

    if (!text) {
      throw new ProviderError("Gemini returned an empty post", { retryable: false });
    }
    return text;
  }
}
