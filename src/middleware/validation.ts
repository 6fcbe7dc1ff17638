/**
 * Validation Middleware
 * Zod-based request body validation
 */

import { Request, Response, NextFunction } from 'express';
import { z, ZodError, ZodSchema } from 'zod';
import { logger } from '../config/logger';
import '../types/express';

/**
 * Body of /respuesta and /consulta. An empty question is accepted and
 * answered with the specialist fallback.
 */
export const preguntaSchema = z.object({
  pregunta: z.string({
    required_error: 'El campo pregunta es obligatorio',
    invalid_type_error: 'El campo pregunta debe ser texto'
  }).describe('Pregunta en lenguaje natural')
});

export type PreguntaRequest = z.infer<typeof preguntaSchema>;

interface ValidationErrorResponse {
  success: false;
  error: {
    message: string;
    code: 'VALIDATION_ERROR';
    timestamp: string;
    requestId?: string;
    details: Array<{
      field: string;
      message: string;
      code?: string;
    }>;
  };
}

/**
 * Format Zod validation errors for API response
 */
function formatZodErrors(error: ZodError): ValidationErrorResponse['error']['details'] {
  return error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message,
    code: err.code
  }));
}

/**
 * Generic validation middleware factory
 */
export function validate<T>(schema: ZodSchema<T>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      const body: ValidationErrorResponse = {
        success: false,
        error: {
          message: 'Request validation failed',
          code: 'VALIDATION_ERROR',
          timestamp: new Date().toISOString(),
          requestId: req.id,
          details: formatZodErrors(result.error)
        }
      };

      logger.warn('Request validation failed', {
        endpoint: req.path,
        method: req.method,
        errors: body.error.details
      });

      res.status(400).json(body);
      return;
    }

    req.body = result.data;
    next();
  };
}

export const validatePregunta = validate(preguntaSchema);
