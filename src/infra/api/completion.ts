import OpenAI from 'openai';
import { ProviderError } from '../../shared/errors';
import type { CompletionProvider, GeneratorConfig, Prompt } from '../../domain/types';

type ProviderSettings = GeneratorConfig['provider'];

export interface ChatCompletionResult {
  choices: Array<{ message: { content: string | null } }>;
}

/**
 * The slice of the OpenAI client the provider calls.
 */
export interface ChatCompletionsApi {
  create(body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletionResult>;
}

/**
 * Chat-completion provider for any OpenAI-compatible endpoint (Groq by default).
 * One request per call; retries are left to the caller.
 */
export class OpenAICompatibleProvider implements CompletionProvider {
  private readonly completions: ChatCompletionsApi;

  constructor(private readonly settings: ProviderSettings, completions?: ChatCompletionsApi) {
    this.completions =
      completions ??
      new OpenAI({
        apiKey: settings.apiKey,
        baseURL: settings.baseURL,
        timeout: settings.timeoutMs,
        maxRetries: 0,
      }).chat.completions;
  }

  async complete(prompt: Prompt): Promise<string> {
    let result: ChatCompletionResult;
    try {
      result = await this.completions.create({
        model: this.settings.model,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
        temperature: this.settings.temperature,
        max_tokens: this.settings.maxTokens,
      });
    } catch (error) {
      throw this.toProviderError(error);
    }

    const content = result.choices[0]?.message.content;
    if (typeof content !== 'string' || content.trim() === '') {
      throw new ProviderError(`Empty response from model ${this.settings.model}`);
    }
    return content.trim();
  }

  private toProviderError(error: unknown): ProviderError {
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new ProviderError(`Request to ${this.settings.baseURL} timed out after ${this.settings.timeoutMs}ms`);
    }
    if (error instanceof OpenAI.APIError && error.status !== undefined) {
      return new ProviderError(`Provider returned an error: ${error.status} ${error.message}`, error.status);
    }
    const msg = error instanceof Error ? error.message : String(error);
    return new ProviderError(`Could not reach ${this.settings.baseURL}: ${msg}`);
  }
}
