import { Router, Request, Response } from 'express';
import { IssuedToken } from '../auth/tokenAuthority';

interface TokenResponse {
  access_token: string;
  token_type: 'bearer';
  expires_in?: number;
}

/**
 * POST /token
 * Issue a bearer token. Public.
 */
export function createTokenRoutes(issueToken: () => IssuedToken): Router {
  const router = Router();

  router.post('/token', (_req: Request, res: Response) => {
    const issued = issueToken();
    const body: TokenResponse = {
      access_token: issued.token,
      token_type: 'bearer'
    };

    if (issued.expiresAt) {
      body.expires_in = Math.round((issued.expiresAt.getTime() - issued.issuedAt.getTime()) / 1000);
    }

    res.json(body);
  });

  return router;
}
