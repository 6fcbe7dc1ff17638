/**
 * Specialist clients: in-process, or over HTTP against a specialist service
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../../config/logger';
import { SpecialistEndpoints } from '../../config';
import { UpstreamUnavailableError } from '../../middleware/error-handler';
import { SpecialistDomain } from '../types';
import { SpecialistRegistry, SpecialistResponder } from '../specialists';
import { SpecialistClient, SpecialistClients } from './types';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1)
});

const answerResponseSchema = z.object({
  respuesta: z.string()
});

export class LocalSpecialistClient implements SpecialistClient {
  constructor(
    public readonly domain: SpecialistDomain,
    private readonly responder: SpecialistResponder
  ) {}

  async ask(pregunta: string): Promise<string> {
    return this.responder.answer(pregunta);
  }
}

export interface HttpSpecialistClientOptions {
  baseURL: string;
  timeoutMs: number;
}

/**
 * Calls a specialist's POST /respuesta with a token from its own POST /token.
 * The token is cached; a 401 drops it and the call is retried once with a
 * fresh one. Any other failure surfaces as UpstreamUnavailableError.
 */
export class HttpSpecialistClient implements SpecialistClient {
  private readonly http: AxiosInstance;
  private tokenRequest: Promise<string> | null = null;

  constructor(
    public readonly domain: SpecialistDomain,
    private readonly options: HttpSpecialistClientOptions
  ) {
    this.http = axios.create({
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      headers: {
        'Content-Type': 'application/json'
      },
      // Statuses are inspected by hand below
      validateStatus: () => true
    });
  }

  async ask(pregunta: string): Promise<string> {
    try {
      return await this.requestAnswer(pregunta, false);
    } catch (error) {
      if (error instanceof UpstreamUnavailableError) {
        throw error;
      }

      const reason = axios.isAxiosError(error)
        ? error.code ?? error.message
        : error instanceof Error
          ? error.message
          : String(error);

      logger.error(`Error al comunicar con ${this.options.baseURL}`, {
        domain: this.domain,
        reason
      });
      throw new UpstreamUnavailableError(this.domain, { reason });
    }
  }

  private async requestAnswer(pregunta: string, isRetry: boolean): Promise<string> {
    const token = await this.getToken();
    const response = await this.http.post<unknown>(
      '/respuesta',
      { pregunta },
      { headers: { Authorization: `Bearer ${token}` } }
    );

    if (response.status === 401 && !isRetry) {
      logger.info('Specialist rejected cached token, requesting a new one', { domain: this.domain });
      this.tokenRequest = null;
      return this.requestAnswer(pregunta, true);
    }

    if (response.status < 200 || response.status >= 300) {
      throw new UpstreamUnavailableError(this.domain, { status: response.status });
    }

    const parsed = answerResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new UpstreamUnavailableError(this.domain, { reason: 'Malformed specialist response' });
    }

    return parsed.data.respuesta;
  }

  private getToken(): Promise<string> {
    if (!this.tokenRequest) {
      // A failed fetch must not stay cached
      this.tokenRequest = this.fetchToken().catch((error: unknown) => {
        this.tokenRequest = null;
        throw error;
      });
    }
    return this.tokenRequest;
  }

  private async fetchToken(): Promise<string> {
    const response = await this.http.post<unknown>('/token');

    if (response.status !== 200) {
      throw new UpstreamUnavailableError(this.domain, { status: response.status, step: 'token' });
    }

    const parsed = tokenResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new UpstreamUnavailableError(this.domain, { reason: 'Malformed token response' });
    }

    return parsed.data.access_token;
  }
}

export interface SpecialistClientOptions {
  endpoints?: SpecialistEndpoints;
  timeoutMs?: number;
}

/**
 * HTTP clients when endpoints are configured, in-process responders otherwise.
 */
export function createSpecialistClients(
  registry: SpecialistRegistry,
  options: SpecialistClientOptions = {}
): SpecialistClients {
  const { endpoints, timeoutMs = 5000 } = options;

  const build = (domain: SpecialistDomain): SpecialistClient =>
    endpoints
      ? new HttpSpecialistClient(domain, { baseURL: endpoints[domain], timeoutMs })
      : new LocalSpecialistClient(domain, registry.get(domain));

  logger.info('Specialist delegation configured', {
    mode: endpoints ? 'http' : 'in-process',
    endpoints: endpoints ?? null
  });

  return {
    [SpecialistDomain.CONSULTAS]: build(SpecialistDomain.CONSULTAS),
    [SpecialistDomain.CUENTAS]: build(SpecialistDomain.CUENTAS),
    [SpecialistDomain.IDENTIDAD]: build(SpecialistDomain.IDENTIDAD),
    [SpecialistDomain.IA]: build(SpecialistDomain.IA)
  };
}
