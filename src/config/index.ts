import { z } from 'zod';
import { env, ServiceRole } from './env';
import { SPECIALIST_DOMAINS, SpecialistDomain } from '../agents/types';

export type SpecialistEndpoints = Record<SpecialistDomain, string>;

export interface AppConfig {
  role: ServiceRole;
  nodeEnv: string;
  host: string;
  port: number;
  specialistEndpoints?: SpecialistEndpoints;
  specialistTimeoutMs: number;
  tokenTtlSeconds: number;
  corsOrigin: string;
  corsCredentials: boolean;
}

const endpointSchema = z.string().url();

/**
 * Parse the comma-separated specialist base URLs (consultas, cuentas,
 * identidad, ia). An empty value means the orchestrator answers in process.
 */
export function parseSpecialistEndpoints(raw: string | undefined): SpecialistEndpoints | undefined {
  const urls = (raw ?? '')
    .split(',')
    .map((url) => url.trim().replace(/\/+$/, ''))
    .filter((url) => url.length > 0);

  if (urls.length === 0) {
    return undefined;
  }

  if (urls.length !== SPECIALIST_DOMAINS.length) {
    throw new Error(
      `Expected ${SPECIALIST_DOMAINS.length} specialist endpoints (${SPECIALIST_DOMAINS.join(', ')}), got ${urls.length}`
    );
  }

  for (const url of urls) {
    const result = endpointSchema.safeParse(url);
    if (!result.success) {
      throw new Error(`Invalid specialist endpoint: ${url}`);
    }
  }

  const [consultas, cuentas, identidad, ia] = urls;
  return {
    [SpecialistDomain.CONSULTAS]: consultas,
    [SpecialistDomain.CUENTAS]: cuentas,
    [SpecialistDomain.IDENTIDAD]: identidad,
    [SpecialistDomain.IA]: ia
  };
}

export const appConfig: AppConfig = {
  role: env.SERVICE_ROLE,
  nodeEnv: env.NODE_ENV,
  host: env.HOST,
  port: env.PORT,
  specialistEndpoints: parseSpecialistEndpoints(env.SPECIALIST_ENDPOINTS ?? env.MICROS_ENDPOINTS),
  specialistTimeoutMs: env.SPECIALIST_TIMEOUT_MS,
  tokenTtlSeconds: env.TOKEN_TTL_SECONDS,
  corsOrigin: env.CORS_ORIGIN,
  corsCredentials: env.CORS_CREDENTIALS
};

export default appConfig;
