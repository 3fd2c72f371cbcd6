import { createApp } from './app';
import { env } from './config/env';
import logger from './config/logger';
import { createContainer } from './container';

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Rejection:', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
});

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception:', { error: error.message, stack: error.stack });
  process.exit(1);
});

async function start(): Promise<void> {
  const container = await createContainer(env);
  const app = createApp(container);

  const server = app.listen(env.PORT, () => {
    logger.info('RouteFare Bot Starting...');
    logger.info(`Server running on port ${env.PORT}`);
  });

  server.on('error', (error: Error) => {
    logger.error('Server error:', { error: error.message });
  });

  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
      container
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown failed:', { error: error instanceof Error ? error.message : 'Unknown error' });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

start().catch((error: unknown) => {
  logger.error('Failed to start server:', {
    error: error instanceof Error ? error.message : 'Unknown error',
  });
  process.exit(1);
});
