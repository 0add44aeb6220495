import { Request, Response, NextFunction } from 'express';
import { AmbiguousMatchException, AppException, ErrorCode, RateLimitException } from '../utils/exceptions';
import { logger } from '../config/logger.config';
import { env } from '../config/env.config';

interface ErrorBody {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

function detailsFor(err: AppException): Record<string, unknown> | undefined {
  if (err instanceof AmbiguousMatchException) {
    return { candidates: err.candidates };
  }
  if (err instanceof RateLimitException) {
    return { retryAfterSeconds: err.retryAfterSeconds };
  }
  return undefined;
}

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  if (err instanceof AppException) {
    logger.warn('Application error', {
      code: err.errorCode,
      message: err.message,
      statusCode: err.statusCode,
      path: req.path,
      method: req.method,
    });

    const body: ErrorBody = { error: { code: err.errorCode, message: err.message } };
    const details = detailsFor(err);
    if (details) body.error.details = details;

    if (err instanceof RateLimitException && err.retryAfterSeconds !== null) {
      res.setHeader('Retry-After', String(err.retryAfterSeconds));
    }
    res.status(err.statusCode).json(body);
    return;
  }

  // Stack traces stay out of production logs
  const logPayload: Record<string, unknown> = {
    error: err.message,
    path: req.path,
    method: req.method,
  };
  if (env.NODE_ENV !== 'production') {
    logPayload.stack = err.stack;
  } else {
    logPayload.errorType = err.constructor.name;
  }
  logger.error('Unexpected error', logPayload);

  const body: ErrorBody = {
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: 'An error occurred while processing your request',
    },
  };
  res.status(500).json(body);
};
