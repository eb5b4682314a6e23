export * from './correlationId';
export * from './errorHandler';
export * from './requestLogger';
export * from './thumbnailLocals';
