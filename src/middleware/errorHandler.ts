import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';
import { AppError, createErrorResponse, errorMessage } from '../utils/errors';
import { getRequestCorrelationId } from './correlationId';

export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const requestId = getRequestCorrelationId(req);

  // Log the error with context
  logger.error('Request error occurred', {
    error: errorMessage(error),
    code: error instanceof AppError ? error.code : undefined,
    stack: error instanceof Error ? error.stack : undefined,
    requestId,
    method: req.method,
    url: req.originalUrl,
    userAgent: req.headers['user-agent'],
    ip: req.ip
  });

  if (error instanceof AppError) {
    res
      .status(error.statusCode)
      .json(createErrorResponse(error.code, error.message, requestId, req.originalUrl, error.details));
    return;
  }

  // Default server error
  const message = process.env.NODE_ENV === 'production'
    ? 'An unexpected error occurred'
    : errorMessage(error);
  const details = process.env.NODE_ENV === 'development' && error instanceof Error
    ? { stack: error.stack, name: error.name }
    : undefined;

  res.status(500).json(createErrorResponse('INTERNAL_SERVER_ERROR', message, requestId, req.originalUrl, details));
};
