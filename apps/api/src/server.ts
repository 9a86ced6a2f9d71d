import { config, validateConfig } from './config/app.config';
import { createApp } from './app';
import { logger } from './utils/logger';
import { describeError } from './utils/errors';
import { initializeServices } from './services/service-registry';

async function startServer(): Promise<void> {
  // Validate configuration
  try {
    validateConfig(config);
    logger.info('Configuration validated successfully');
  } catch (error) {
    logger.error('Configuration validation failed:', error);
    process.exit(1);
  }

  logger.info('Initializing services...');
  const services = await initializeServices();

  const app = createApp(services.controllers, services.health);

  const server = app.listen(config.port, () => {
    logger.info(`Workshop ID manager running on port ${config.port}`);
    logger.info(`Environment: ${config.nodeEnv}`);
  });

  // IDs carried over from plain ID files get their metadata in the background
  services.workshop.refreshMissingDetails().catch((error: unknown) => {
    logger.warn(`[Workshop] Background metadata fetch failed: ${describeError(error)}`);
  });

  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down gracefully...`);
    services.dispose();
    server.close(() => process.exit(0));
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
