/**
 * Error taxonomy shared by the services and the HTTP error boundary.
 * Each kind carries the status code and category it is answered with.
 */

export type ErrorCode =
  | 'validation_error'
  | 'processing_error'
  | 'service_unavailable'
  | 'upstream_error'
  | 'internal_error';

export class AppError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly code: ErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad caller input: filename, extension, size or form fields. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'validation_error');
  }
}

/** I/O failure while materializing or reading an uploaded file. */
export class ProcessingError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, 'processing_error', { cause });
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message = 'AI service is not available.') {
    super(message, 503, 'service_unavailable');
  }
}

/** The completion API failed or answered with something unusable. */
export class UpstreamError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 502, 'upstream_error', { cause });
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
