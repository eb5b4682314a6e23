import { Request } from 'express';
import { v4 as uuidv4 } from 'uuid';
import '../types/express';

// Base error interface
export interface BaseError extends Error {
  code: string;
  statusCode: number;
  details?: unknown;
  isOperational?: boolean;
}

export class AppError extends Error implements BaseError {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: unknown;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number,
    details?: unknown,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

// Caller errors
export class ArgumentError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'ARGUMENT_ERROR', 400, details);
  }
}

export class UnsupportedOperationError extends AppError {
  constructor(operation: string) {
    super(`Method \`${operation}()\` is not a thumbnail operation`, 'UNSUPPORTED_OPERATION', 400, { operation });
  }
}

export class UnsupportedFormatError extends AppError {
  constructor(format: string) {
    super(`Format \`${format}\` is not supported`, 'UNSUPPORTED_FORMAT', 400, { format });
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = 'Resource') {
    super(`${resource} not found`, 'NOT_FOUND', 404);
  }
}

// Source image errors
export class SourceNotFoundError extends AppError {
  constructor(source: string) {
    super(`File or directory \`${source}\` is not readable`, 'SOURCE_NOT_FOUND', 404, { source });
  }
}

export class InvalidSourceImageError extends AppError {
  constructor(source: string, reason?: string) {
    super(`Unable to read image from \`${source}\``, 'INVALID_SOURCE_IMAGE', 422, { source, reason });
  }
}

// Server-side errors
export class DirectoryNotWritableError extends AppError {
  constructor(directory: string) {
    super(`The directory \`${directory}\` is not writable`, 'DIRECTORY_NOT_WRITABLE', 500, { directory });
  }
}

export class NoOperationAppliedError extends AppError {
  constructor() {
    super('No valid method called before the `save()` method', 'NO_OPERATION_APPLIED', 500, undefined, false);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', 500, details, false);
  }
}

// Error response interface
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    timestamp: string;
    requestId: string;
    path?: string;
  };
}

export function createErrorResponse(
  code: string,
  message: string,
  requestId: string,
  path?: string,
  details?: unknown
): ErrorResponse {
  return {
    error: {
      code,
      message,
      ...(details !== undefined ? { details } : {}),
      timestamp: new Date().toISOString(),
      requestId,
      ...(path !== undefined ? { path } : {})
    }
  };
}

// Checks the shape, not the class: errors from another realm fail `instanceof Error`
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

// Correlation ID utilities
export function generateCorrelationId(): string {
  return `req_${uuidv4()}`;
}

export function getCorrelationId(req: Request): string {
  if (req.correlationId) {
    return req.correlationId;
  }
  const header = req.headers['x-request-id'] ?? req.headers['x-correlation-id'];
  return typeof header === 'string' && header.length > 0 ? header : generateCorrelationId();
}
