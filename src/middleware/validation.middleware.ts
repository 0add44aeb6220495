import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodTypeAny } from 'zod';
import { logger } from '../config/logger.config';
import { ErrorCode } from '../utils/exceptions';

type RequestSource = 'query' | 'params';

/**
 * Reject a request whose query or route params do not match `schema`.
 * Controllers re-parse with the same schema to get typed values.
 */
export function validateRequest(schema: ZodTypeAny, source: RequestSource = 'query') {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await schema.parseAsync(req[source]);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const firstError = error.issues[0];
        const path = firstError && firstError.path.length > 0 ? `${firstError.path.join('.')}: ` : '';
        res.status(400).json({
          error: {
            code: ErrorCode.QUERY_ERROR,
            message: firstError ? `${path}${firstError.message}` : 'Validation failed',
          },
        });
        return;
      }

      logger.error('Validation middleware error', { error, source });
      next(error);
    }
  };
}
