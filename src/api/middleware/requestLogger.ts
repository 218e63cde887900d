import { Request, Response, NextFunction } from 'express';
import { logger } from '../../config/logger';

/** Logs method, path, status and elapsed time once the response is sent. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  res.on('finish', () => {
    const seconds = (Date.now() - start) / 1000;
    logger.info(`${req.method} ${req.path} - Status: ${res.statusCode} - Time: ${seconds.toFixed(3)}s`);
  });
  next();
}
