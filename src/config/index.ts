/**
 * Central configuration. All env vars are read here so the rest of the app
 * stays env-agnostic and testable. Services receive the slices they need.
 */
import os from 'os';
import dotenv from 'dotenv';

dotenv.config();

const DEFAULT_ALLOWED_EXTENSIONS = [
  'txt',
  'csv',
  'json',
  'md',
  'py',
  'js',
  'ts',
  'html',
  'xml',
  'pdf',
  'xlsx',
  'docx',
  'odt',
];

export function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseExtensions(value: string | undefined): ReadonlySet<string> {
  const list = value
    ? value
        .split(',')
        .map((ext) => ext.trim().toLowerCase().replace(/^\./, ''))
        .filter(Boolean)
    : DEFAULT_ALLOWED_EXTENSIONS;
  return new Set(list);
}

export interface AIConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface FilesConfig {
  maxFileSizeBytes: number;
  allowedExtensions: ReadonlySet<string>;
  tempDir: string;
  maxFiles: number;
  concurrency: number;
  /** Decode .pdf and .docx through their parsers instead of raw UTF-8. */
  extractDocumentText: boolean;
}

export const config = {
  env: process.env.NODE_ENV || 'development',
  host: process.env.HOST || '0.0.0.0',
  port: Math.floor(parseNumber(process.env.PORT, 8000)),
  logLevel: (process.env.LOG_LEVEL || 'info').toLowerCase(),
  version: '1.0.0',

  ai: {
    baseUrl: process.env.BASE_URL || '',
    apiKey: process.env.API_KEY || '',
    model: process.env.AI_MODEL || 'deepseek-reasoner',
    temperature: parseNumber(process.env.AI_TEMPERATURE, 0.6),
    maxTokens: Math.floor(parseNumber(process.env.AI_MAX_TOKENS, 4000)),
    // AI_TIMEOUT is given in seconds; the SDK takes milliseconds.
    timeoutMs: Math.round(parseNumber(process.env.AI_TIMEOUT, 60) * 1000),
  } satisfies AIConfig,

  files: {
    maxFileSizeBytes: parseNumber(process.env.MAX_FILE_SIZE_MB, 10) * 1024 * 1024,
    allowedExtensions: parseExtensions(process.env.ALLOWED_EXTENSIONS),
    tempDir: process.env.TEMP_DIR || os.tmpdir(),
    maxFiles: Math.floor(parseNumber(process.env.MAX_FILES, 20)),
    concurrency: Math.floor(parseNumber(process.env.FILE_CONCURRENCY, 5)),
    extractDocumentText: String(process.env.EXTRACT_DOCUMENT_TEXT || 'false').toLowerCase() === 'true',
  } satisfies FilesConfig,
};
