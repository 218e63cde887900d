import { getLLMService } from '../ai/llm';
import type { ILLMService } from '../ai/llm';
import { buildFullPrompt } from '../ai/prompts/templates';
import { logger } from '../config/logger';
import { ServiceUnavailableError } from '../errors';
import type { CompletionResult, OutputFormat } from '../types';
import { parseJsonResponse } from '../utils/json-response';

/**
 * Sends a prompt (plus file context) to the completion API and shapes the
 * reply as raw text or a parsed JSON object.
 */
export class CompletionService {
  constructor(private readonly llm: ILLMService) {}

  async generateCompletion(
    prompt: string,
    fileContent = '',
    format: OutputFormat = 'text'
  ): Promise<CompletionResult> {
    if (!this.llm.available) {
      throw new ServiceUnavailableError();
    }

    const fullPrompt = buildFullPrompt(prompt, fileContent, format);
    const response = await this.llm.chat([{ role: 'user', content: fullPrompt }]);
    logger.debug('Completion received', { format, usage: response.usage });

    if (format === 'json') {
      return { kind: 'structured', structured: parseJsonResponse(response.content) };
    }
    return { kind: 'text', text: response.content };
  }
}

let instance: CompletionService | null = null;

export function getCompletionService(): CompletionService {
  if (!instance) {
    instance = new CompletionService(getLLMService());
  }
  return instance;
}
