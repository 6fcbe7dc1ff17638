import { Router, Request, Response } from 'express';
import { TokenAuthority } from '../auth/tokenAuthority';
import { IntentRouter } from '../agents/orchestrator/intentRouter';
import { requireBearerToken } from '../middleware/auth';
import { PreguntaRequest, validatePregunta } from '../middleware/validation';

/**
 * POST /consulta
 * Classify the question, delegate it to the chosen specialist and return
 * that specialist's answer unchanged. The domain goes in X-Routed-To.
 */
export function createConsultaRoutes(intentRouter: IntentRouter, authority: TokenAuthority): Router {
  const router = Router();

  router.post(
    '/consulta',
    requireBearerToken(authority),
    validatePregunta,
    async (req: Request<{}, {}, PreguntaRequest>, res: Response) => {
      const routed = await intentRouter.route(req.body.pregunta);

      res.setHeader('X-Routed-To', routed.domain);
      res.json({ respuesta: routed.respuesta });
    }
  );

  return router;
}
