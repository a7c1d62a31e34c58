import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

import type { LlmConfig } from '../config';
import { getDetail, getStatus, LlmConfigurationError, LlmResponseError } from '../errors';
import { exponentialBackoff } from '../util/retry';

export type CompletionRequest = {
  system?: string;
  prompt: string;
  maxTokens?: number;
};

export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

export const buildMessages = ({ system, prompt }: CompletionRequest): ChatCompletionMessageParam[] => {
  const messages: ChatCompletionMessageParam[] = [];

  if (system) {
    messages.push({ role: 'system', content: system });
  }

  messages.push({ role: 'user', content: prompt });

  return messages;
};

export class OpenAiCompletionClient implements CompletionClient {
  private client: OpenAI | null = null;

  constructor(private readonly config: LlmConfig) {}

  private getClient(): OpenAI {
    if (this.client) {
      return this.client;
    }

    const { apiKey } = this.config;

    if (!apiKey) {
      throw new LlmConfigurationError('LLM API key not configured. Set OPENAI_API_KEY to your provider token.');
    }

    this.client = new OpenAI({
      apiKey,
      baseURL: this.config.baseUrl,
      maxRetries: 0,
    });

    return this.client;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const client = this.getClient();
    const { model, temperature, maxAttempts } = this.config;

    const response = await exponentialBackoff(
      () =>
        client.chat.completions.create({
          model,
          temperature,
          max_tokens: request.maxTokens ?? this.config.maxTokens,
          messages: buildMessages(request),
        }),
      {
        maxAttempts,
        onRetry: (error, attempt, delay) => {
          const status = getStatus(error);
          const prefix = typeof status === 'number' ? `status ${status}: ` : '';
          console.warn(`[LLM] Attempt ${attempt} failed (${prefix}${getDetail(error)}). Retrying in ${delay}ms.`);
        },
      },
    );

    const content = response.choices[0]?.message?.content;

    if (!content) {
      throw new LlmResponseError('LLM response did not contain any content.');
    }

    return content;
  }
}
