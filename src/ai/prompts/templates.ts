/**
 * Prompt composition for the relay: user prompt, then uploaded file context,
 * then the JSON-only instruction when structured output is requested.
 */
import type { OutputFormat } from '../../types';

export const FILE_CONTENT_HEADER = 'File content:';

export const JSON_ONLY_INSTRUCTION =
  'IMPORTANT: Respond only with valid JSON, with no additional text before or after the JSON.';

export function buildFullPrompt(prompt: string, fileContent: string, format: OutputFormat): string {
  let fullPrompt = prompt;
  if (fileContent) {
    fullPrompt += `\n\n${FILE_CONTENT_HEADER}\n${fileContent}`;
  }
  if (format === 'json') {
    fullPrompt += `\n\n${JSON_ONLY_INSTRUCTION}`;
  }
  return fullPrompt;
}
