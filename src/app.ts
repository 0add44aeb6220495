import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { StatsClient } from './client';
import { env } from './config/env.config';
import { logger } from './config/logger.config';
import { errorHandler } from './middleware/error.middleware';
import { requestTimingMiddleware } from './middleware/request-timing.middleware';
import { createRoutes } from './routes';

/**
 * Allowed browser origins from CORS_ORIGINS (comma-separated). An empty
 * list allows any origin; the API is read-only and carries no credentials.
 */
export function parseAllowedOrigins(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

export function createApp(client: StatsClient, allowedOrigins = parseAllowedOrigins(env.CORS_ORIGINS)): Express {
  const app = express();

  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      if (!origin || allowedOrigins.length === 0 || allowedOrigins.includes(origin)) {
        return callback(null, true);
      }
      logger.warn('CORS rejected origin', { origin });
      return callback(null, false);
    },
    methods: ['GET', 'OPTIONS'],
  };

  app.use(
    helmet({
      // JSON only, no HTML served
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
    })
  );
  app.use(cors(corsOptions));
  app.use(express.json({ limit: '10kb' }));
  app.use(requestTimingMiddleware);

  app.use('/api', createRoutes(client));

  // Must be last
  app.use(errorHandler);

  return app;
}
