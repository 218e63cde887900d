/**
 * POST /process - prompt plus optional files, answered as text or JSON.
 * GET /health and GET / are plain liveness/info endpoints.
 */

import { Router, Request, RequestHandler, Response, NextFunction } from 'express';
import { body } from 'express-validator';
import multer from 'multer';
import { config } from '../../config';
import { logger } from '../../config/logger';
import { ValidationError } from '../../errors';
import type { CompletionService } from '../../services/completion.service';
import type { FileProcessorService } from '../../services/file-processor.service';
import type { HealthResponse, OutputFormat, PromptResponse, UploadedFile } from '../../types';
import { validate } from '../middleware/validate';

export const MAX_PROMPT_LENGTH = 2000;

export interface ProcessRouteDeps {
  fileProcessor: FileProcessorService;
  completionService: CompletionService;
  maxFiles?: number;
  maxFileSizeBytes?: number;
}

/** Accepts 'json'/'text' in any case and the legacy form codes 1 (json) and 2 (text). */
export function parseOutputFormat(value: unknown): OutputFormat | null {
  if (value === undefined || value === null || value === '') return 'text';
  const normalized = String(value).trim().toLowerCase();
  if (normalized === 'json' || normalized === '1') return 'json';
  if (normalized === 'text' || normalized === '2') return 'text';
  return null;
}

// busboy hands part filenames over as latin1; restore the UTF-8 the client sent.
function decodeFilename(name: string): string {
  return Buffer.from(name, 'latin1').toString('utf8');
}

function uploadedFiles(req: Request): UploadedFile[] {
  const files = req.files;
  if (!files) return [];
  const list = Array.isArray(files) ? files : Object.values(files).flat();
  return list.map((f) => ({ filename: decodeFilename(f.originalname), content: f.buffer }));
}

/** Anything multer or busboy rejects is a malformed or oversized request. */
export function toUploadError(err: unknown): ValidationError {
  if (err instanceof multer.MulterError) {
    return new ValidationError(err.code === 'LIMIT_FILE_SIZE' ? 'size exceeds limit' : err.message);
  }
  const reason = err instanceof Error ? err.message : String(err);
  return new ValidationError(`Malformed multipart body: ${reason}`);
}

function parseUploads(upload: RequestHandler): RequestHandler {
  return (req, res, next) => {
    upload(req, res, (err?: unknown) => {
      if (err) {
        next(toUploadError(err));
        return;
      }
      next();
    });
  };
}

export function processRoutes(deps: ProcessRouteDeps): Router {
  const router = Router();
  const maxFiles = deps.maxFiles ?? config.files.maxFiles;
  const maxFileSizeBytes = deps.maxFileSizeBytes ?? config.files.maxFileSizeBytes;
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { files: maxFiles, fileSize: maxFileSizeBytes },
  });

  router.post(
    '/process',
    parseUploads(upload.array('files', maxFiles)),
    validate([
      body('prompt')
        .isString()
        .withMessage('Prompt is required')
        .bail()
        .trim()
        .isLength({ min: 1, max: MAX_PROMPT_LENGTH })
        .withMessage(`Prompt must be between 1 and ${MAX_PROMPT_LENGTH} characters`),
      body(['outputFormat', 'output_format'])
        .optional()
        .custom((value) => parseOutputFormat(value) !== null)
        .withMessage('Output format must be json or text'),
    ]),
    async (req: Request, res: Response, next: NextFunction) => {
      const start = Date.now();
      try {
        const form: Record<string, unknown> = req.body;
        const prompt = String(form.prompt).trim();
        const format = parseOutputFormat(form.outputFormat ?? form.output_format) ?? 'text';

        const { names, combinedText } = await deps.fileProcessor.processFiles(uploadedFiles(req));
        logger.info(`Processing prompt with ${names.length} files`, { format });

        const result = await deps.completionService.generateCompletion(prompt, combinedText, format);

        const elapsed = (Date.now() - start) / 1000;
        logger.info(`Processing finished in ${elapsed.toFixed(2)}s`);

        const payload: PromptResponse = {
          success: true,
          data: result.kind === 'text' ? result.text : result.structured,
          filesProcessed: [...names],
          processingTimeSeconds: Math.round(elapsed * 100) / 100,
          message: 'Processing completed successfully',
        };
        res.json(payload);
      } catch (e) {
        next(e);
      }
    }
  );

  router.get('/health', (_req, res) => {
    const payload: HealthResponse = {
      success: true,
      message: 'The system is healthy',
      timestamp: new Date().toISOString(),
    };
    res.json(payload);
  });

  router.get('/', (_req, res) => {
    res.json({ message: 'Prompt Relay Service', version: config.version });
  });

  return router;
}
