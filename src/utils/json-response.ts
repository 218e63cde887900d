import { logger } from '../config/logger';

export const JSON_FALLBACK_NOTE = 'Could not extract valid JSON from the response.';

// First brace-delimited span, allowing braces nested two levels deep.
const JSON_OBJECT_PATTERN = /\{(?:[^{}]|(?:\{(?:[^{}]|\{[^{}]*\})*\}))*\}/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Turns a model reply into a JSON object. Tries the whole reply, then the first
 * embedded object; failing both, wraps the reply in `{ response, note }`.
 */
export function parseJsonResponse(content: string): Record<string, unknown> {
  const trimmed = content.trim();
  const direct = tryParseObject(trimmed);
  if (direct) return direct;

  const match = JSON_OBJECT_PATTERN.exec(content);
  if (match) {
    const embedded = tryParseObject(match[0]);
    if (embedded) return embedded;
  }

  logger.warn('Could not extract valid JSON from AI response', { preview: trimmed.slice(0, 120) });
  return { response: trimmed, note: JSON_FALLBACK_NOTE };
}
