import { Request, Response, NextFunction } from 'express';
import { getCorrelationId } from '../utils/errors';
import '../types/express';

/**
 * Gives every request a correlation ID (taken from `x-request-id` or
 * `x-correlation-id` when the client sends one) and echoes it back.
 * Should be one of the first middleware in the chain.
 */
export const correlationIdMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId = getCorrelationId(req);
  req.correlationId = correlationId;

  res.setHeader('x-request-id', correlationId);
  res.setHeader('x-correlation-id', correlationId);

  next();
};

export const getRequestCorrelationId = (req: Request): string => {
  return req.correlationId || getCorrelationId(req);
};
