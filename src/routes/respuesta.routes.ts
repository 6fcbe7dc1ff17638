import { Router, Request, Response } from 'express';
import { TokenAuthority } from '../auth/tokenAuthority';
import { SpecialistResponder } from '../agents/specialists';
import { requireBearerToken } from '../middleware/auth';
import { PreguntaRequest, validatePregunta } from '../middleware/validation';
import { logger } from '../config/logger';

/**
 * POST /respuesta
 * Answer a question from this specialist's rule table. An unmatched
 * question is still a 200 carrying the fallback text.
 */
export function createRespuestaRoutes(responder: SpecialistResponder, authority: TokenAuthority): Router {
  const router = Router();

  router.post(
    '/respuesta',
    requireBearerToken(authority),
    validatePregunta,
    (req: Request<{}, {}, PreguntaRequest>, res: Response) => {
      const { pregunta } = req.body;
      logger.info(`[${responder.domain.toUpperCase()}] Pregunta recibida`, {
        requestId: req.id,
        pregunta
      });

      res.json({ respuesta: responder.answer(pregunta) });
    }
  );

  return router;
}
