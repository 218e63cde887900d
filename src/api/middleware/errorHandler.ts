import { Request, Response, NextFunction } from 'express';
import { logger } from '../../config/logger';
import { ValidationError, isAppError } from '../../errors';
import type { ErrorResponse } from '../../types';

function clientStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/** Errors from express and its parsers that carry a 4xx status are caller input problems. */
export function toKnownError(err: unknown): unknown {
  if (isAppError(err)) return err;
  if (clientStatus(err) !== undefined) {
    return new ValidationError(err instanceof Error ? err.message : 'Malformed request.');
  }
  return err;
}

/**
 * Single error boundary. Known errors keep their status and category;
 * anything else becomes a generic 500 without internals in the body.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const known = toKnownError(err);

  if (isAppError(known)) {
    if (known.statusCode >= 500) {
      logger.error(`${req.method} ${req.path} failed`, { code: known.code, error: known.message });
    } else {
      logger.warn(`${req.method} ${req.path} rejected`, { code: known.code, error: known.message });
    }
    const payload: ErrorResponse = { success: false, error: known.code, details: known.message };
    res.status(known.statusCode).json(payload);
    return;
  }

  logger.error('Unexpected error during processing', err instanceof Error ? err : { error: String(err) });
  const payload: ErrorResponse = {
    success: false,
    error: 'internal_error',
    details: 'Unexpected error during processing.',
  };
  res.status(500).json(payload);
}
