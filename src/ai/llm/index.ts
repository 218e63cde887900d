/**
 * Single LLM provider export, built once from config on first use.
 */
import type { ILLMService } from './types';
import { config } from '../../config';
import { OpenAILLMService } from './OpenAILLMService';

let instance: ILLMService | null = null;

export function getLLMService(): ILLMService {
  if (!instance) {
    instance = OpenAILLMService.fromConfig(config.ai);
  }
  return instance;
}

export type { ILLMService, LLMMessage, LLMOptions, LLMResponse } from './types';
