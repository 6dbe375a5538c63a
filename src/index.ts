import { validateEnv } from './config/env.js';
import { logger } from './config/logger.js';
import { createApp } from './app.js';
import { createRuntime } from './bootstrap.js';

/**
 * Main web server entry point
 * Run with RUN_MODE=web
 */

async function startServer() {
  const env = validateEnv();

  if (env.RUN_MODE !== 'web') {
    logger.warn(`RUN_MODE is ${env.RUN_MODE}, not starting web server`);
    return;
  }

  logger.info('Starting comment ingestion server');
  logger.info(`Environment: ${env.NODE_ENV}`);

  const runtime = await createRuntime(env);
  const app = createApp({
    ingestion: runtime.ingestion,
    traceStore: runtime.traceStore,
    deadLetters: runtime.deadLetters,
  });

  const server = app.listen(env.PORT, () => {
    logger.info(`Server listening on port ${env.PORT}`);
    logger.info(`Health check: http://localhost:${env.PORT}/health`);
  });

  // Graceful shutdown
  const shutdown = () => {
    logger.info('Shutting down gracefully...');

    server.close(() => {
      logger.info('HTTP server closed');
      runtime
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Error closing connections', { error });
          process.exit(1);
        });
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

startServer().catch((error) => {
  logger.error('Failed to start server', { error });
  process.exit(1);
});
