import { Server } from 'http';
import { createApp, ORCHESTRATOR_ROLE, ServiceName, parseServiceName } from './app';
import { logger } from './config/logger';
import { appConfig, SpecialistEndpoints } from './config';
import { handleUncaughtException, handleUnhandledRejection } from './middleware/error-handler';
import { createDefaultRegistry } from './agents/specialists';
import { createSpecialistClients } from './agents/orchestrator/specialistClient';
import { SPECIALIST_DOMAINS, SpecialistDomain } from './agents/types';

/**
 * Start one service on `port`.
 */
export function startService(service: ServiceName, port: number, endpoints?: SpecialistEndpoints): Server {
  const registry = createDefaultRegistry();
  const clients =
    service === ORCHESTRATOR_ROLE
      ? createSpecialistClients(registry, {
        endpoints: endpoints ?? appConfig.specialistEndpoints,
        timeoutMs: appConfig.specialistTimeoutMs
      })
      : undefined;

  const app = createApp({ service, registry, clients });

  return app.listen(port, appConfig.host, () => {
    logger.info(`${service} is running on port ${port} in ${appConfig.nodeEnv} mode`);
    logger.info(`Health check available at http://localhost:${port}/health`);
  });
}

/**
 * Start the orchestrator on `basePort` and the specialists on the next four
 * ports (consultas, cuentas, identidad, ia). The orchestrator delegates to
 * them over HTTP.
 */
export function startAll(basePort: number): Server[] {
  const ports = new Map<SpecialistDomain, number>();
  SPECIALIST_DOMAINS.forEach((domain, index) => ports.set(domain, basePort + index + 1));

  const endpointFor = (domain: SpecialistDomain) => `http://localhost:${ports.get(domain) ?? basePort}`;
  const endpoints: SpecialistEndpoints = {
    [SpecialistDomain.CONSULTAS]: endpointFor(SpecialistDomain.CONSULTAS),
    [SpecialistDomain.CUENTAS]: endpointFor(SpecialistDomain.CUENTAS),
    [SpecialistDomain.IDENTIDAD]: endpointFor(SpecialistDomain.IDENTIDAD),
    [SpecialistDomain.IA]: endpointFor(SpecialistDomain.IA)
  };

  const specialists = SPECIALIST_DOMAINS.map((domain) =>
    startService(domain, ports.get(domain) ?? basePort)
  );

  logger.info('🎉 Mock up en:', {
    orquestador: `http://localhost:${basePort}`,
    ...endpoints
  });

  return [startService(ORCHESTRATOR_ROLE, basePort, endpoints), ...specialists];
}

const closeServer = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });

// Graceful shutdown handler
async function gracefulShutdown(signal: string, servers: Server[]): Promise<void> {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  try {
    await Promise.all(servers.map(closeServer));
    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during graceful shutdown:', error);
    process.exit(1);
  }
}

// Initialize and start server(s)
function startServer(): Server[] {
  handleUncaughtException();
  handleUnhandledRejection();

  const servers =
    appConfig.role === 'all'
      ? startAll(appConfig.port)
      : [startService(parseServiceName(appConfig.role), appConfig.port)];

  const onSignal = (signal: string) => {
    gracefulShutdown(signal, servers).catch((error: unknown) => {
      logger.error('Shutdown failed:', error);
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  return servers;
}

// Start the server if this file is run directly
if (require.main === module) {
  try {
    startServer();
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

export { startServer };
