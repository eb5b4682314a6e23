import dotenv from 'dotenv';
import { promises as fs } from 'fs';
import { createApp } from './app';
import { loadConfig } from './config';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errors';

// Load environment variables
dotenv.config();

async function startServer(): Promise<void> {
  const config = loadConfig();

  await fs.mkdir(config.thumbnails.targetDir, { recursive: true });
  logger.info('Thumbnail directory ready', { targetDir: config.thumbnails.targetDir });

  const app = createApp({ config });

  const server = app.listen(config.port, () => {
    logger.info('Thumbnail server started', {
      port: config.port,
      environment: config.nodeEnv,
      timestamp: new Date().toISOString()
    });
  });

  // Graceful shutdown handling
  const gracefulShutdown = (signal: string): void => {
    logger.info(`Received ${signal}, starting graceful shutdown...`);

    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });

    // Force shutdown after 30 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught Exception:', { error: error.message, stack: error.stack });
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', { reason: errorMessage(reason) });
    process.exit(1);
  });
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', { error: errorMessage(error) });
  process.exit(1);
});
