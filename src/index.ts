// Export all modules for easy access
export * from './models';
export * from './services';
export * from './controllers';
export * from './middleware';
export { createApp, CreateAppOptions } from './app';
export { loadConfig, AppConfig, ThumbnailConfig } from './config';
export { logger } from './utils/logger';
export * from './utils/errors';
