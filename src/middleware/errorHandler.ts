/**
 * Centralized error handling middleware
 */

import crypto from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import logger from '../utils/logger';

// Base error classes
export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string,
    public isOperational = true,
    public details?: unknown,
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, message, 'VALIDATION_ERROR', true, details);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super(401, message, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(404, `${resource} not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(409, message, 'CONFLICT');
    this.name = 'ConflictError';
  }
}

export class DatabaseError extends AppError {
  constructor(message = 'Database operation failed', originalError?: Error) {
    super(500, message, 'DATABASE_ERROR');
    this.name = 'DatabaseError';
    if (originalError) {
      this.stack = originalError.stack;
    }
  }
}

// Request logging middleware
export const requestLogger = (
  req: Request,
  res: Response,
  next: NextFunction,
): void => {
  const start = Date.now();

  logger.info('Incoming request', {
    method: req.method,
    url: req.url,
    userAgent: req.get('User-Agent'),
    ip: req.ip,
  });

  res.on('finish', () => {
    logger.info('Response sent', {
      method: req.method,
      url: req.url,
      statusCode: res.statusCode,
      duration: `${Date.now() - start}ms`,
    });
  });

  next();
};

// Validation error handler
const handleValidationError = (error: ZodError): AppError => {
  const messages = error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });

  return new ValidationError(
    `Validation failed: ${messages.join(', ')}`,
    error.errors,
  );
};

const hasPgCode = (error: Error): error is Error & { code: string } =>
  'code' in error && typeof error.code === 'string';

// Database error handler
const handleDatabaseError = (error: Error): AppError => {
  logger.error('Database error details', {
    name: error.name,
    message: error.message,
    stack: error.stack,
  });

  if (hasPgCode(error)) {
    switch (error.code) {
      case '23505': // unique_violation
        return new ConflictError('Resource already exists');
      case '23503': // foreign_key_violation
        return new ValidationError('Referenced resource does not exist');
      case '23502': // not_null_violation
        return new ValidationError('Required field is missing');
      case '23514': // check_violation
        return new ValidationError('Data violates constraint');
      default:
        return new DatabaseError('Database operation failed', error);
    }
  }

  return new DatabaseError('Database operation failed', error);
};

/**
 * Maps any thrown value onto an AppError. Chat command handlers use it
 * to answer client errors in the chat.
 */
export const toAppError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof ZodError) {
    return handleValidationError(error);
  }
  if (error instanceof SyntaxError && 'body' in error) {
    return new ValidationError('Malformed JSON body');
  }
  if (error instanceof Error) {
    if (hasPgCode(error)) {
      return handleDatabaseError(error);
    }
    return new AppError(
      500,
      process.env.NODE_ENV === 'production'
        ? 'Something went wrong'
        : error.message,
      'INTERNAL_ERROR',
      false,
    );
  }
  return new AppError(500, 'Something went wrong', 'INTERNAL_ERROR', false);
};

interface ErrorResponseBody {
  error: {
    message: string;
    code: string;
    details?: unknown;
    stack?: string;
  };
}

// Main error handling middleware
export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  next: NextFunction,
): void => {
  const appError = toAppError(error);

  const logData = {
    error: {
      name: appError.name,
      message: appError.message,
      code: appError.code,
      statusCode: appError.statusCode,
      stack: appError.stack,
    },
    request: {
      method: req.method,
      url: req.url,
      ip: req.ip,
    },
  };

  if (appError.statusCode >= 500) {
    logger.error('Server error', logData);
  } else if (appError.statusCode >= 400) {
    logger.warn('Client error', logData);
  } else {
    logger.info('Request error', logData);
  }

  const response: ErrorResponseBody = {
    error: {
      message: appError.message,
      code: appError.code || 'UNKNOWN_ERROR',
    },
  };

  if (process.env.NODE_ENV === 'development') {
    response.error.details = appError.details;
    if (!appError.isOperational) {
      response.error.stack = appError.stack;
    }
  }

  res.status(appError.statusCode).json(response);
};

// Async error wrapper for route handlers
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler => {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

// 404 handler for unmatched routes
export const notFoundHandler = (
  req: Request,
  res: Response,
  next: NextFunction,
): void => {
  next(new NotFoundError(`Route ${req.method} ${req.path}`));
};

/**
 * Constant-time comparison of a presented secret with the expected one
 */
export const secretsMatch = (
  presented: string | undefined,
  expected: string,
): boolean => {
  if (presented === undefined) {
    return false;
  }
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
};

/**
 * Bearer-token guard for the admin API.
 */
export const requireAdminToken = (token: string): RequestHandler => {
  return (req, res, next) => {
    if (!secretsMatch(req.get('Authorization'), `Bearer ${token}`)) {
      next(new UnauthorizedError('Invalid or missing admin token'));
      return;
    }
    next();
  };
};

/**
 * Accepts only requests carrying the secret given to Telegram in setWebHook
 */
export const requireWebhookSecret = (secret: string): RequestHandler => {
  return (req, res, next) => {
    if (!secretsMatch(req.get('X-Telegram-Bot-Api-Secret-Token'), secret)) {
      next(new UnauthorizedError('Invalid webhook secret'));
      return;
    }
    next();
  };
};
