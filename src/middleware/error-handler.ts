import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger';
import { env } from '../config/env';
import { StatusCodes } from '../utils/response.utils';
import '../types/express';

// Custom error class for API errors
export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly isOperational: boolean;
  readonly details?: unknown;

  constructor(
    statusCode: number,
    message: string,
    code = 'ERROR',
    details?: unknown,
    isOperational = true
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Missing, malformed, unknown or expired bearer token.
 */
export class AuthenticationError extends ApiError {
  constructor(message = 'Token inválido o no proporcionado') {
    super(StatusCodes.UNAUTHORIZED, message, 'UNAUTHORIZED');
  }
}

/**
 * The orchestrator could not obtain an answer from the chosen specialist.
 */
export class UpstreamUnavailableError extends ApiError {
  readonly domain: string;

  constructor(domain: string, details?: unknown) {
    super(
      StatusCodes.BAD_GATEWAY,
      'Error al contactar con microservicio',
      'UPSTREAM_UNAVAILABLE',
      { domain, ...(details !== undefined ? { cause: details } : {}) }
    );
    this.domain = domain;
  }
}

interface ErrorBody {
  success: false;
  error: {
    message: string;
    code: string;
    timestamp: string;
    requestId?: string;
    details?: unknown;
    stack?: string[];
  };
}

// Error type guards
const isApiError = (error: unknown): error is ApiError => error instanceof ApiError;

const isTrustedError = (error: unknown): boolean => isApiError(error) && error.isOperational;

const numericProperty = (error: unknown, key: 'status' | 'statusCode'): number | undefined => {
  if (typeof error === 'object' && error !== null && key in error) {
    const value: unknown = Reflect.get(error, key);
    return typeof value === 'number' ? value : undefined;
  }
  return undefined;
};

// Body-parser and similar libraries tag their errors with a status
const resolveStatusCode = (error: Error): number => {
  if (isApiError(error)) {
    return error.statusCode;
  }
  const status = numericProperty(error, 'status') ?? numericProperty(error, 'statusCode');
  if (status !== undefined && status >= 400 && status < 600) {
    return status;
  }
  if (error.message.includes('ECONNREFUSED')) {
    return StatusCodes.SERVICE_UNAVAILABLE;
  }
  return StatusCodes.INTERNAL_SERVER_ERROR;
};

const resolveCode = (error: Error, statusCode: number): string => {
  if (isApiError(error)) {
    return error.code;
  }
  if (statusCode === StatusCodes.BAD_REQUEST) {
    return 'BAD_REQUEST';
  }
  return 'ERROR';
};

// Format error response based on environment
const formatErrorResponse = (error: Error, statusCode: number, requestId?: string): ErrorBody => {
  const isDevelopment = env.NODE_ENV === 'development';
  const isProduction = env.NODE_ENV === 'production';
  const trusted = isTrustedError(error) || statusCode < StatusCodes.INTERNAL_SERVER_ERROR;

  const body: ErrorBody = {
    success: false,
    error: {
      message:
        isProduction && !trusted
          ? 'Internal Server Error'
          : error.message || 'Unknown error occurred',
      code: resolveCode(error, statusCode),
      timestamp: new Date().toISOString(),
      requestId
    }
  };

  if ((!isProduction || trusted) && isApiError(error) && error.details !== undefined) {
    body.error.details = error.details;
  }

  if (isDevelopment && error.stack) {
    body.error.stack = error.stack.split('\n');
  }

  return body;
};

// Log error with context
const logError = (error: Error, statusCode: number, req: Request) => {
  const errorContext = {
    message: error.message,
    statusCode,
    method: req.method,
    path: req.path,
    headers: {
      'user-agent': req.headers['user-agent'],
      'content-type': req.headers['content-type'],
      authorization: req.headers.authorization ? 'Bearer ***' : undefined
    },
    ip: req.ip,
    requestId: req.id
  };

  if (isTrustedError(error) || statusCode < StatusCodes.INTERNAL_SERVER_ERROR) {
    logger.warn('Operational error occurred', errorContext);
  } else {
    logger.error('Unexpected error occurred', {
      ...errorContext,
      stack: error.stack
    });
  }
};

// Main error handler middleware
export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const statusCode = resolveStatusCode(err);
  logError(err, statusCode, req);
  res.status(statusCode).json(formatErrorResponse(err, statusCode, req.id));
};

// 404 Not Found handler
export const notFoundHandler = (req: Request, res: Response): void => {
  const error = new ApiError(StatusCodes.NOT_FOUND, `Cannot ${req.method} ${req.path}`, 'NOT_FOUND', {
    method: req.method,
    path: req.path
  });
  res.status(StatusCodes.NOT_FOUND).json(formatErrorResponse(error, StatusCodes.NOT_FOUND, req.id));
};

// Uncaught exception handler
export const handleUncaughtException = (): void => {
  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception:', {
      message: error.message,
      stack: error.stack
    });

    // Give time to log before shutting down
    setTimeout(() => {
      process.exit(1);
    }, 1000);
  });
};

// Unhandled rejection handler
export const handleUnhandledRejection = (): void => {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection:', {
      reason: reason instanceof Error ? reason.message : reason,
      stack: reason instanceof Error ? reason.stack : undefined
    });

    // Convert to exception
    throw reason;
  });
};
