import { Request, Response, NextFunction } from 'express';
import { performance } from 'perf_hooks';
import crypto from 'crypto';
import { logger } from '../config/logger';
import '../types/express';

// Generate unique request ID
export const generateRequestId = (): string => {
  return crypto.randomBytes(16).toString('hex');
};

// Request ID middleware
export const requestIdMiddleware = (req: Request, res: Response, next: NextFunction) => {
  // Use existing ID or generate new one
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header.length > 0 ? header : generateRequestId();
  req.id = requestId;
  res.setHeader('X-Request-Id', requestId);
  next();
};

// Request logger middleware with timing
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = performance.now();

  logger.debug('Incoming request', {
    requestId: req.id,
    method: req.method,
    path: req.path,
    headers: {
      'user-agent': req.headers['user-agent'],
      'content-type': req.headers['content-type'],
      'content-length': req.headers['content-length']
    },
    ip: req.ip
  });

  res.on('finish', () => {
    const duration = performance.now() - startTime;
    const logData = {
      requestId: req.id,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: `${duration.toFixed(2)}ms`,
      durationMs: duration
    };

    // Matching is in-memory; anything this slow is an upstream problem
    if (duration > 1000) {
      logger.warn('WARNING: Slow request detected (>1 second)', logData);
    } else {
      logger.info('Request completed', logData);
    }
  });

  next();
};
