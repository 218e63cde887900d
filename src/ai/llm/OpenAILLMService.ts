import OpenAI from 'openai';
import type { AIConfig } from '../../config';
import { logger } from '../../config/logger';
import { ServiceUnavailableError, UpstreamError } from '../../errors';
import type {
  ChatCompletionsApi,
  ILLMService,
  LLMMessage,
  LLMOptions,
  LLMResponse,
  UpstreamCompletion,
} from './types';

export type LLMDefaults = Pick<AIConfig, 'model' | 'temperature' | 'maxTokens'>;

const INVALID_RESPONSE = 'Invalid response from AI service.';

/**
 * Completion client for any OpenAI-compatible API (base URL + key).
 * SDK retries are off: one upstream failure surfaces immediately.
 */
export class OpenAILLMService implements ILLMService {
  constructor(
    private readonly completions: ChatCompletionsApi | null,
    private readonly defaults: LLMDefaults
  ) {}

  static fromConfig(ai: AIConfig): OpenAILLMService {
    if (!ai.baseUrl || !ai.apiKey) {
      logger.error('BASE_URL and API_KEY must be configured; AI service disabled');
      return new OpenAILLMService(null, ai);
    }
    const client = new OpenAI({
      baseURL: ai.baseUrl,
      apiKey: ai.apiKey,
      timeout: ai.timeoutMs,
      maxRetries: 0,
    });
    logger.info('OpenAI client initialized', { baseUrl: ai.baseUrl, model: ai.model });
    return new OpenAILLMService(client.chat.completions, ai);
  }

  get available(): boolean {
    return this.completions !== null;
  }

  async chat(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse> {
    if (!this.completions) {
      throw new ServiceUnavailableError();
    }

    let completion: UpstreamCompletion | undefined;
    try {
      completion = await this.completions.create({
        model: options?.model ?? this.defaults.model,
        messages: messages.map((m) => ({ role: m.role, content: m.content })),
        temperature: options?.temperature ?? this.defaults.temperature,
        max_tokens: options?.maxTokens ?? this.defaults.maxTokens,
      });
    } catch (error) {
      logger.error('Completion request failed', { error: error instanceof Error ? error.message : String(error) });
      throw new UpstreamError('Failed to process AI request.', error);
    }

    if (!completion) {
      logger.error('Completion response is empty');
      throw new UpstreamError(INVALID_RESPONSE);
    }
    if (!completion.choices || completion.choices.length === 0) {
      logger.error('Completion response has no choices');
      throw new UpstreamError(INVALID_RESPONSE);
    }
    const message = completion.choices[0].message;
    if (!message) {
      logger.error('Completion choice has no message');
      throw new UpstreamError(INVALID_RESPONSE);
    }
    if (message.content === null || message.content === undefined) {
      logger.error('Completion message content is null');
      throw new UpstreamError(INVALID_RESPONSE);
    }

    return {
      content: message.content,
      usage: {
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
      },
    };
  }
}
