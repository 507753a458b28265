import '@eduhub/shared/config';
import logger, { logServiceStart, logServiceStop } from '@eduhub/shared/config/logger';
import { createApp } from './app';
import { loadLearningServiceConfig } from './config/env';
import { createStore } from './config/store';

async function start(): Promise<void> {
  const config = loadLearningServiceConfig();
  const store = await createStore(config);
  const app = createApp({ store, config });
  const PORT = config.PORT;

  const server = app.listen(PORT, () => {
    logServiceStart('Learning Service', PORT);
  });

  server.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      logger.error(`Port ${PORT} is already in use`, {
        service: 'learning-service',
        port: PORT,
        error: err.message,
        code: err.code,
      });
    } else {
      logger.error('Server error', {
        service: 'learning-service',
        error: err.message,
        code: err.code,
      });
    }
    process.exit(1);
  });

  const gracefulShutdown = (signal: string) => {
    logger.info(`Received ${signal}, starting graceful shutdown`, { service: 'learning-service' });

    server.close(() => {
      logServiceStop('Learning Service', PORT);
      store
        .close()
        .then(() => {
          logger.info('Document store closed', { service: 'learning-service' });
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Error closing document store', {
            service: 'learning-service',
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        });
    });

    // Force shutdown after 30 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout', { service: 'learning-service' });
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

start().catch((error: unknown) => {
  logger.error('Learning Service failed to start', {
    service: 'learning-service',
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
