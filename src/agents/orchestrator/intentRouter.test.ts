import { IntentRouter } from './intentRouter';
import { LocalSpecialistClient } from './specialistClient';
import { SpecialistClient, SpecialistClients } from './types';
import { TokenAuthority } from '../../auth/tokenAuthority';
import { SpecialistRegistry, createDefaultRegistry } from '../specialists';
import { SpecialistDomain } from '../types';
import { UpstreamUnavailableError } from '../../middleware/error-handler';

class EchoClient implements SpecialistClient {
  public readonly calls: string[] = [];

  constructor(public readonly domain: SpecialistDomain) {}

  async ask(pregunta: string): Promise<string> {
    this.calls.push(pregunta);
    return `${this.domain}:${pregunta}`;
  }
}

function echoClients(): Record<SpecialistDomain, EchoClient> {
  return {
    [SpecialistDomain.CONSULTAS]: new EchoClient(SpecialistDomain.CONSULTAS),
    [SpecialistDomain.CUENTAS]: new EchoClient(SpecialistDomain.CUENTAS),
    [SpecialistDomain.IDENTIDAD]: new EchoClient(SpecialistDomain.IDENTIDAD),
    [SpecialistDomain.IA]: new EchoClient(SpecialistDomain.IA)
  };
}

function localClients(registry: SpecialistRegistry): SpecialistClients {
  return {
    [SpecialistDomain.CONSULTAS]: new LocalSpecialistClient(
      SpecialistDomain.CONSULTAS,
      registry.get(SpecialistDomain.CONSULTAS)
    ),
    [SpecialistDomain.CUENTAS]: new LocalSpecialistClient(
      SpecialistDomain.CUENTAS,
      registry.get(SpecialistDomain.CUENTAS)
    ),
    [SpecialistDomain.IDENTIDAD]: new LocalSpecialistClient(
      SpecialistDomain.IDENTIDAD,
      registry.get(SpecialistDomain.IDENTIDAD)
    ),
    [SpecialistDomain.IA]: new LocalSpecialistClient(SpecialistDomain.IA, registry.get(SpecialistDomain.IA))
  };
}

describe('IntentRouter', () => {
  const registry = createDefaultRegistry();

  describe('classify', () => {
    const router = new IntentRouter(registry, echoClients(), new TokenAuthority());

    it('routes identity documents to identidad', () => {
      const result = router.classify('Por favor verifica mi DNI');

      expect(result.domain).toBe(SpecialistDomain.IDENTIDAD);
      expect(result.matched).toBe(true);
      expect(result.confidence).toBe(1);
    });

    it('routes account opening to cuentas', () => {
      const result = router.classify('Quiero abrir una cuenta');

      expect(result.domain).toBe(SpecialistDomain.CUENTAS);
      expect(result.score).toBe(2);
    });

    it('routes general banking topics to ia', () => {
      const result = router.classify('¿Qué tipo de interés tienen las hipotecas?');

      expect(result.domain).toBe(SpecialistDomain.IA);
      expect(result.matched).toBe(true);
    });

    it('picks the domain with the most keyword hits', () => {
      const result = router.classify('¿Tengo comisiones en la tarjeta?');

      expect(result.scores).toEqual({
        [SpecialistDomain.CONSULTAS]: 1,
        [SpecialistDomain.CUENTAS]: 2,
        [SpecialistDomain.IDENTIDAD]: 0,
        [SpecialistDomain.IA]: 1
      });
      expect(result.domain).toBe(SpecialistDomain.CUENTAS);
      expect(result.confidence).toBe(0.5);
    });

    it('breaks ties by routing priority', () => {
      const oficina = router.classify('¿Dónde hay una oficina?');
      expect(oficina.domain).toBe(SpecialistDomain.CONSULTAS);
      expect(oficina.confidence).toBe(0.5);

      const identidad = router.classify('Necesito verificar mi identidad');
      expect(identidad.scores[SpecialistDomain.CUENTAS]).toBe(1);
      expect(identidad.scores[SpecialistDomain.IDENTIDAD]).toBe(1);
      expect(identidad.domain).toBe(SpecialistDomain.IDENTIDAD);
    });

    it('sends unmatched queries to ia with zero confidence', () => {
      const result = router.classify('¿Cuál es el color del cielo?');

      expect(result).toEqual({
        domain: SpecialistDomain.IA,
        confidence: 0,
        score: 0,
        matched: false,
        scores: {
          [SpecialistDomain.CONSULTAS]: 0,
          [SpecialistDomain.CUENTAS]: 0,
          [SpecialistDomain.IDENTIDAD]: 0,
          [SpecialistDomain.IA]: 0
        }
      });
    });

    it('ignores case and accents', () => {
      expect(router.classify('QUIERO ABRIR UNA CUENTA').domain).toBe(SpecialistDomain.CUENTAS);
      expect(router.classify('codigo por sms').domain).toBe(SpecialistDomain.IDENTIDAD);
    });
  });

  describe('route', () => {
    it('delegates the raw question to the chosen specialist', async () => {
      const clients = echoClients();
      const router = new IntentRouter(registry, clients, new TokenAuthority());

      const routed = await router.route('Por favor verifica mi DNI');

      expect(routed.domain).toBe(SpecialistDomain.IDENTIDAD);
      expect(routed.respuesta).toBe('identidad:Por favor verifica mi DNI');
      expect(clients[SpecialistDomain.IDENTIDAD].calls).toEqual(['Por favor verifica mi DNI']);
      expect(clients[SpecialistDomain.CUENTAS].calls).toEqual([]);
    });

    it('returns the specialist answer unchanged', async () => {
      const router = new IntentRouter(registry, localClients(registry), new TokenAuthority());

      await expect(router.route('¿Qué tipo de cuenta ofrecéis?')).resolves.toMatchObject({
        domain: SpecialistDomain.CUENTAS,
        respuesta:
          'Ofrecemos cuentas corrientes, cuentas nómina y cuentas de ahorro sin comisiones de mantenimiento.'
      });
      await expect(router.route('¿Cuál es el color del cielo?')).resolves.toMatchObject({
        domain: SpecialistDomain.IA,
        respuesta: 'Lo siento, no tengo información sobre eso en este momento.'
      });
    });

    it('propagates delegation failures', async () => {
      const clients = echoClients();
      const failing: SpecialistClient = {
        domain: SpecialistDomain.IA,
        ask: () => Promise.reject(new UpstreamUnavailableError(SpecialistDomain.IA))
      };
      const router = new IntentRouter(
        registry,
        { ...clients, [SpecialistDomain.IA]: failing },
        new TokenAuthority()
      );

      await expect(router.route('hipoteca')).rejects.toBeInstanceOf(UpstreamUnavailableError);
    });
  });

  it('issues tokens its authority accepts', () => {
    const authority = new TokenAuthority();
    const router = new IntentRouter(registry, echoClients(), authority);

    expect(authority.validate(router.issueToken().token)).toBe(true);
  });
});
