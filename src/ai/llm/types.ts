/**
 * LLM abstraction: provider-agnostic interface so callers never touch the SDK.
 * The OpenAI SDK backs it against any OpenAI-compatible base URL.
 */
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface LLMResponse {
  content: string;
  usage?: { promptTokens: number; completionTokens: number };
}

export interface ILLMService {
  /** False when the client could not be built; calls then fail without a request. */
  readonly available: boolean;
  chat(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse>;
}

/**
 * Reply shape as received, before validation. Every level may be missing on a
 * misbehaving OpenAI-compatible server, even where the SDK types say otherwise.
 */
export type UpstreamCompletion = {
  choices?: Array<{ message?: { content?: string | null } | null }> | null;
  usage?: { prompt_tokens: number; completion_tokens: number } | null;
} | null;

/** The slice of `openai.chat.completions` the service calls. */
export interface ChatCompletionsApi {
  create(body: ChatCompletionCreateParamsNonStreaming): Promise<UpstreamCompletion | undefined>;
}
