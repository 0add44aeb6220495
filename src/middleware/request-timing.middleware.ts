import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger.config';

/** Requests that fan out into long pagination walks routinely take a few seconds. */
export const SLOW_REQUEST_MS = 5000;

export function requestTimingMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    const durationMs = Date.now() - start;
    const entry = { method: req.method, path: req.originalUrl, status: res.statusCode, durationMs };

    if (durationMs > SLOW_REQUEST_MS) {
      logger.warn('Slow request', entry);
    } else {
      logger.debug('Request handled', entry);
    }
  });

  next();
}
