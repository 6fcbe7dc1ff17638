import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../config/logger';
import { TokenAuthority } from '../auth/tokenAuthority';
import { AuthenticationError } from './error-handler';
import '../types/express';

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

/**
 * Extract the token from an `Authorization: Bearer <token>` header.
 */
export function extractBearerToken(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  const match = BEARER_PATTERN.exec(header);
  return match ? match[1] : undefined;
}

/**
 * Rejects the request with 401 unless it carries a token issued by
 * `authority`. Runs before body validation and matching.
 */
export function requireBearerToken(authority: TokenAuthority): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const token = extractBearerToken(req.headers.authorization);

    if (!token || !authority.validate(token)) {
      logger.warn('Rejected request with missing or invalid token', {
        requestId: req.id,
        method: req.method,
        path: req.path,
        hasAuthorization: Boolean(req.headers.authorization)
      });
      next(new AuthenticationError());
      return;
    }

    next();
  };
}
