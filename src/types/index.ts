/**
 * Shared domain types for the prompt relay service.
 * Keeps API and services aligned on the same shapes.
 */

export type OutputFormat = 'text' | 'json';

export interface UploadedFile {
  filename: string;
  content: Buffer;
}

export interface ProcessedFileSet {
  /** One entry per input file, in input order. */
  readonly names: readonly string[];
  /** Decoded contents joined by a single newline, in input order. */
  readonly combinedText: string;
}

export type CompletionResult =
  | { kind: 'text'; text: string }
  | { kind: 'structured'; structured: Record<string, unknown> };

export interface PromptResponse {
  success: true;
  data: string | Record<string, unknown>;
  filesProcessed: string[];
  processingTimeSeconds: number;
  message?: string;
}

export interface ErrorResponse {
  success: false;
  error: string;
  details?: string;
}

export interface HealthResponse {
  success: true;
  message: string;
  timestamp: string;
}
