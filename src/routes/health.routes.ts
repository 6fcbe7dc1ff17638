import { Router, Request, Response } from 'express';

/**
 * GET /health
 * Liveness check. Public.
 */
export function createHealthRoutes(service: string): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      service,
      timestamp: new Date().toISOString(),
      uptime: process.uptime()
    });
  });

  return router;
}
