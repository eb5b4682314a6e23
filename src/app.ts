import express from 'express';
import helmet from 'helmet';
import { AppConfig } from './config';
import { ThumbnailController } from './controllers/ThumbnailController';
import { correlationIdMiddleware } from './middleware/correlationId';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { thumbnailLocals } from './middleware/thumbnailLocals';
import { createThumbnailRoutes } from './routes/thumbnailRoutes';
import { ThumbnailServiceOverrides, ThumbnailServices, createThumbnailServices } from './services/thumbnails';
import { NotFoundError } from './utils/errors';

export interface CreateAppOptions extends ThumbnailServiceOverrides {
  config: AppConfig;
  services?: ThumbnailServices;
}

export const createApp = ({ config, services, ...overrides }: CreateAppOptions): express.Application => {
  const app = express();
  const thumbnails = services ?? createThumbnailServices(config.thumbnails, overrides);

  // Correlation ID tracking (should be first)
  app.use(correlationIdMiddleware);

  app.use(helmet());

  // Request logging
  app.use(requestLogger);

  // Generated thumbnails
  app.use(config.thumbnails.publicPath, express.static(config.thumbnails.targetDir, {
    fallthrough: true,
    index: false,
    maxAge: '7d'
  }));

  // Thumb helper for views
  app.use(thumbnailLocals(thumbnails.helper));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0'
    });
  });

  // API routes
  app.use('/api/thumbnails', createThumbnailRoutes(new ThumbnailController(thumbnails.helper, thumbnails.manager)));

  // 404 handler
  app.use((req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.originalUrl}`));
  });

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
};
