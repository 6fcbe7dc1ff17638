import 'express-async-errors';
import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { appConfig } from './config';
import { stream } from './config/logger';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { requestIdMiddleware, requestLogger } from './middleware/request-logger';
import { ok } from './utils/response.utils';
import { TokenAuthority } from './auth/tokenAuthority';
import { SpecialistRegistry, createDefaultRegistry } from './agents/specialists';
import { IntentRouter } from './agents/orchestrator/intentRouter';
import { createSpecialistClients } from './agents/orchestrator/specialistClient';
import { SpecialistClients } from './agents/orchestrator/types';
import { SpecialistDomain, isSpecialistDomain } from './agents/types';
import { createTokenRoutes } from './routes/token.routes';
import { createHealthRoutes } from './routes/health.routes';
import { createRespuestaRoutes } from './routes/respuesta.routes';
import { createConsultaRoutes } from './routes/consulta.routes';

export const ORCHESTRATOR_ROLE = 'orquestador';

export type ServiceName = typeof ORCHESTRATOR_ROLE | SpecialistDomain;

export function parseServiceName(value: string): ServiceName {
  if (value === ORCHESTRATOR_ROLE) {
    return ORCHESTRATOR_ROLE;
  }
  if (isSpecialistDomain(value)) {
    return value;
  }
  throw new Error(`Unknown service "${value}"`);
}

export interface AppOptions {
  service: ServiceName;
  authority?: TokenAuthority;
  registry?: SpecialistRegistry;
  /** Orchestrator only. Defaults to HTTP or in-process clients per configuration. */
  clients?: SpecialistClients;
}

const ORCHESTRATOR_INFO = {
  name: '🧠 Orquestador del Agente IA Bancario',
  description:
    'Servicio que enruta preguntas bancarias a los microservicios adecuados: consultas, cuentas, identidad e inteligencia artificial.',
  version: '1.0.1'
};

// Create Express application for one service
export const createApp = (options: AppOptions): Application => {
  const app = express();
  const authority = options.authority ?? new TokenAuthority({ ttlSeconds: appConfig.tokenTtlSeconds });
  const registry = options.registry ?? createDefaultRegistry();

  // Security middleware
  app.use(
    helmet({
      contentSecurityPolicy: appConfig.nodeEnv === 'production',
      crossOriginEmbedderPolicy: appConfig.nodeEnv === 'production'
    })
  );

  // CORS configuration
  app.use(
    cors({
      origin: appConfig.corsOrigin,
      credentials: appConfig.corsCredentials,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization']
    })
  );

  // Request tracking and logging middleware
  app.use(requestIdMiddleware);
  app.use(morgan('combined', { stream }));
  app.use(requestLogger);

  // Body parsing middleware
  app.use(express.json({ limit: '100kb' }));

  // Public routes
  app.use(createHealthRoutes(options.service));

  let info: { name: string; description: string; version: string };

  if (options.service === ORCHESTRATOR_ROLE) {
    const clients =
      options.clients ??
      createSpecialistClients(registry, {
        endpoints: appConfig.specialistEndpoints,
        timeoutMs: appConfig.specialistTimeoutMs
      });
    const intentRouter = new IntentRouter(registry, clients, authority);

    app.use(createTokenRoutes(() => intentRouter.issueToken()));
    app.use(createConsultaRoutes(intentRouter, authority));
    info = ORCHESTRATOR_INFO;
  } else {
    const responder = registry.get(options.service);

    app.use(createTokenRoutes(() => authority.issue()));
    app.use(createRespuestaRoutes(responder, authority));
    info = {
      name: responder.table.title,
      description: responder.table.description,
      version: responder.table.version
    };
  }

  // Root endpoint
  app.get('/', (_req: Request, res: Response) => {
    ok(res, {
      ...info,
      service: options.service,
      status: 'running',
      timestamp: new Date().toISOString()
    });
  });

  // 404 handler
  app.use(notFoundHandler);

  // Global error handler
  app.use(errorHandler);

  return app;
};
