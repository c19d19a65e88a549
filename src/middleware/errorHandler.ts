import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { createLogger } from '../utils/logger';
import { formatZodIssues } from './validation';

const logger = createLogger('http');

declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

export interface AppError extends Error {
  statusCode: number;
  code: string;
  isOperational: boolean;
  details?: unknown;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  code = 'VALIDATION_ERROR';
  isOperational = true;

  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  code = 'NOT_FOUND_ERROR';
  isOperational = true;

  constructor(message: string = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends Error implements AppError {
  statusCode = 409;
  code = 'CONFLICT_ERROR';
  isOperational = true;

  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ConflictError';
  }
}

export interface ErrorResponse {
  success: false;
  error: {
    message: string;
    code: string;
    statusCode: number;
    correlationId: string;
    details?: unknown;
    stack?: string;
  };
}

const generateCorrelationId = (): string => {
  return `err_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
};

// Sanitize sensitive information from error messages
export const sanitizeErrorMessage = (message: string): string => {
  return message
    .replace(/password=[^&\s]*/gi, 'password=***')
    .replace(/token=[^&\s]*/gi, 'token=***')
    .replace(/key=[^&\s]*/gi, 'key=***')
    .replace(/secret=[^&\s]*/gi, 'secret=***');
};

const formatErrorResponse = (error: AppError, correlationId: string, includeStack = false): ErrorResponse => {
  const response: ErrorResponse = {
    success: false,
    error: {
      message: error.message,
      code: error.code,
      statusCode: error.statusCode,
      correlationId,
    },
  };

  if (error.details !== undefined) {
    response.error.details = error.details;
  }

  if (includeStack && error.stack) {
    response.error.stack = error.stack;
  }

  return response;
};

function isAppError(error: unknown): error is AppError {
  return error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number'
    && 'code' in error && typeof error.code === 'string';
}

// body-parser reports malformed JSON as an error carrying `status: 400`.
function isClientError(error: unknown): error is Error & { status: number } {
  return error instanceof Error && 'status' in error && typeof error.status === 'number'
    && error.status >= 400 && error.status < 500;
}

function toAppError(error: unknown, isDevelopment: boolean): AppError {
  if (isAppError(error)) {
    return error;
  }
  if (error instanceof ZodError) {
    return new ValidationError('Validation failed', formatZodIssues(error));
  }
  if (isClientError(error)) {
    return new ValidationError(sanitizeErrorMessage(error.message));
  }
  const message = error instanceof Error ? error.message : String(error);
  return {
    name: 'InternalServerError',
    message: isDevelopment ? sanitizeErrorMessage(message) : 'Internal server error',
    statusCode: 500,
    code: 'INTERNAL_SERVER_ERROR',
    isOperational: false,
  };
}

// Global error handler middleware
export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  // If response was already sent, delegate to default Express error handler
  if (res.headersSent) {
    return next(error);
  }

  const isDevelopment = process.env.NODE_ENV === 'development';
  const formattedError = toAppError(error, isDevelopment);
  const statusCode = formattedError.statusCode;
  const correlationId = req.correlationId ?? generateCorrelationId();

  const logLevel = statusCode >= 500 ? 'error' : 'warn';
  logger[logLevel](`${req.method} ${req.path} - ${statusCode} - ${formattedError.message} [${correlationId}]`);
  if (statusCode >= 500 && error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }

  res.status(statusCode).json(formatErrorResponse(formattedError, correlationId, isDevelopment));
};

// Async error wrapper to catch promise rejections
export const catchAsync = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};

// 404 handler for unmatched routes
export const notFoundHandler = (req: Request, _res: Response, next: NextFunction): void => {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
};

export default errorHandler;
