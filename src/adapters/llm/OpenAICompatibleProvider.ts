// Chat-completions adapter for any OpenAI-compatible endpoint (OpenAI, Groq, Ollama).

import OpenAI, { APIConnectionTimeoutError, APIUserAbortError } from 'openai';
import { ProviderError, ProviderErrorKind, errorMessage } from '../../core/errors';
import { Logger } from '../../core/services/Logger';
import { CompletionOptions, ProviderAdapter } from '../../core/services/ProviderAdapter';

export type ChatMessage = { role: 'system'; content: string } | { role: 'user'; content: string };

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  max_tokens?: number;
}

export interface ChatCompletionResponse {
  choices: Array<{ message: { content: string | null } }>;
}

export interface RequestOptions {
  signal?: AbortSignal;
  timeout?: number;
  maxRetries?: number;
}

// The part of the OpenAI SDK this adapter uses; tests pass a fake
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionRequest, options?: RequestOptions): PromiseLike<ChatCompletionResponse>;
    };
  };
}

type Options = {
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
};

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined;
  return typeof error.status === 'number' ? error.status : undefined;
}

export function classifyProviderError(error: unknown): ProviderErrorKind {
  if (error instanceof APIUserAbortError) return 'cancelled';
  if (error instanceof APIConnectionTimeoutError) return 'timeout';
  const status = statusOf(error);
  if (status === 401 || status === 403) return 'auth';
  if (status === 429) return 'rate_limited';
  return 'transport';
}

export class OpenAICompatibleProvider implements ProviderAdapter {
  constructor(
    public readonly name: string,
    private client: ChatCompletionClient,
    private model: string,
    private logger: Logger,
    private options: Options = {}
  ) {}

  async complete(prompt: string, systemPrompt: string, options: CompletionOptions = {}): Promise<string> {
    const messages: ChatMessage[] = [];
    if (systemPrompt) messages.push({ role: 'system', content: systemPrompt });
    messages.push({ role: 'user', content: prompt });

    this.logger.debug(`Requesting completion from ${this.name} (model: ${this.model})`);
    const startTime = Date.now();

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages,
          ...(this.options.temperature != null ? { temperature: this.options.temperature } : {}),
          ...(this.options.maxTokens != null ? { max_tokens: this.options.maxTokens } : {}),
        },
        // retries are the caller's decision, not the SDK's
        { signal: options.signal, timeout: this.options.timeoutMs, maxRetries: 0 }
      );
      content = response.choices[0]?.message.content;
    } catch (error) {
      const kind = classifyProviderError(error);
      this.logger.warn(`${this.name} request failed (${kind}): ${errorMessage(error)}`);
      throw new ProviderError(kind, `${this.name}: ${errorMessage(error)}`, { cause: error });
    }

    this.logger.debug(`${this.name} responded in ${Date.now() - startTime}ms`);
    if (!content || !content.trim()) {
      throw new ProviderError('transport', `${this.name}: empty completion`);
    }
    return content;
  }
}

export function createOpenAIClient(apiKey: string, baseURL: string): ChatCompletionClient {
  return new OpenAI({ apiKey, baseURL });
}
