import { createServer } from 'http';

import { createApp } from './app';
import { StatsClient } from './client';
import { env } from './config/env.config';
import { logger } from './config/logger.config';

const client = new StatsClient();
const server = createServer(createApp(client));

server.listen(env.PORT, '0.0.0.0', () => {
  logger.info('Stats API started', {
    port: env.PORT,
    upstream: client.config.baseUrl,
    healthCheck: `http://localhost:${env.PORT}/api/health`,
  });
});

let isShuttingDown = false;
const gracefulShutdown = (): void => {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info('Shutting down gracefully...');

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Walks in flight get ten seconds to finish
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
};

process.on('SIGINT', gracefulShutdown);
process.on('SIGTERM', gracefulShutdown);

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
  gracefulShutdown();
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', { reason: String(reason) });
  gracefulShutdown();
});
