import { SpecialistDomain } from '../types';
import { createQuery } from '../matching/normalize';
import { createDefaultRegistry, DEFAULT_RULE_DEFINITIONS, SpecialistRegistry } from './index';

describe('Specialist responders', () => {
  const registry = createDefaultRegistry();
  const consultas = registry.get(SpecialistDomain.CONSULTAS);
  const cuentas = registry.get(SpecialistDomain.CUENTAS);
  const identidad = registry.get(SpecialistDomain.IDENTIDAD);
  const ia = registry.get(SpecialistDomain.IA);

  describe('consultas', () => {
    it('answers balance questions', () => {
      expect(consultas.answer('¿Cuál es mi saldo actual?')).toBe('Tu saldo actual es de 1.275,45€.');
    });

    it('ignores case and accents', () => {
      const expected = 'Tu saldo actual es de 1.275,45€.';
      expect(consultas.answer('SALDO')).toBe(expected);
      expect(consultas.answer('sáldo')).toBe(expected);
      expect(consultas.answer('saldo')).toBe(expected);
    });

    it('prefers the rule with more keyword hits', () => {
      // movimiento rule hits "compra", "comprado" and "ultimamente"
      expect(consultas.answer('¿Qué he comprado últimamente? ¿Y mi saldo?')).toBe(
        'Tu último movimiento fue una compra de 35€ en Amazon.'
      );
    });

    it('resolves equal hits to the earlier rule', () => {
      expect(consultas.answer('Quiero el extracto y el saldo')).toBe('Tu saldo actual es de 1.275,45€.');
    });

    it('matches an upper-case IBAN request', () => {
      expect(consultas.answer('Dime mi IBAN')).toBe('Tu IBAN es ES6600190020961234567890.');
    });

    it('falls back when nothing matches', () => {
      expect(consultas.answer('¿Qué hora es?')).toBe(
        'No tengo información suficiente para responder a tu consulta específica.'
      );
    });
  });

  describe('cuentas', () => {
    it('lists account types', () => {
      expect(cuentas.answer('¿Qué tipo de cuenta ofrecéis?')).toContain(
        'Ofrecemos cuentas corrientes, cuentas nómina'
      );
    });

    it('opens an account', () => {
      expect(cuentas.answer('Quiero abrir cuenta')).toBe(
        'Tu cuenta ha sido abierta correctamente con IBAN ES6600190020961234567890.'
      );
    });

    it('gives requirements when they outscore the opening phrase', () => {
      expect(cuentas.answer('¿Qué requisitos hay para abrir una cuenta?')).toBe(
        'Para abrir una cuenta necesitas ser mayor de edad, presentar DNI y un justificante de domicilio.'
      );
    });

    it('gives requirements when asked what opening an account takes', () => {
      expect(cuentas.match('¿Qué requisitos tiene abrir una cuenta?').rule?.id).toBe('requisitos');
      expect(cuentas.answer('¿Qué requisitos tiene abrir una cuenta?')).toBe(
        'Para abrir una cuenta necesitas ser mayor de edad, presentar DNI y un justificante de domicilio.'
      );
    });

    it('answers about fees', () => {
      expect(cuentas.answer('¿Tiene comisiones?')).toBe('Las cuentas estándar no tienen comisiones.');
    });

    it('falls back when nothing matches', () => {
      expect(cuentas.answer('Hola')).toBe(
        'No he encontrado información sobre eso. ¿Quieres saber cómo abrir una cuenta o los requisitos?'
      );
    });
  });

  describe('identidad', () => {
    it('validates a DNI', () => {
      expect(identidad.answer('¿Puedes verificar mi DNI?')).toContain(
        'Tu documento ha sido validado correctamente'
      );
    });

    it('prefers the document rule over a tied identity mention', () => {
      expect(identidad.answer('¿Puedes verificar mi identidad con mi DNI?')).toBe(
        'Tu documento ha sido validado correctamente. Coincide con nuestros registros.'
      );
    });

    it('confirms an SMS code', () => {
      expect(identidad.answer('Te envío el código del SMS')).toBe(
        'Código verificado correctamente. Tu sesión es segura.'
      );
    });

    it('falls back when the method is unknown', () => {
      expect(identidad.answer('Quiero verificarme')).toBe(
        'No se ha podido determinar el tipo de verificación. Por favor, especifica el método (DNI, SMS, correo...).'
      );
    });
  });

  describe('ia', () => {
    it('answers mortgage questions', () => {
      expect(ia.answer('¿Qué tipo de interés tienen las hipotecas?')).toBe(
        'Actualmente el tipo de interés para hipotecas es del 3,2%.'
      );
    });

    it('matches accented keywords written without accents', () => {
      expect(ia.answer('Quiero un prestamo')).toBe(
        'Ofrecemos préstamos personales desde un 5,5% TIN con aprobación rápida online.'
      );
    });

    it('apologises when it does not know', () => {
      const answer = ia.answer('¿Cuál es la velocidad de la luz?');
      expect(answer).toBe('Lo siento, no tengo información sobre eso en este momento.');
      expect(answer).toContain('Lo siento');
    });
  });

  it('never returns empty text', () => {
    for (const domain of registry.domains()) {
      expect(registry.get(domain).answer('').length).toBeGreaterThan(0);
    }
  });

  it('returns the same answer for queries with the same normalized form', () => {
    for (const domain of registry.domains()) {
      const responder = registry.get(domain);
      expect(responder.answer('¿Cuál es mi SALDO?')).toBe(responder.answer('cual es mi saldo'));
    }
  });

  it('accepts a pre-normalized query', () => {
    expect(consultas.match(createQuery('mi saldo')).rule?.id).toBe('saldo');
  });
});

describe('SpecialistRegistry', () => {
  it('registers the four domains', () => {
    expect(createDefaultRegistry().domains()).toEqual([
      SpecialistDomain.CONSULTAS,
      SpecialistDomain.CUENTAS,
      SpecialistDomain.IDENTIDAD,
      SpecialistDomain.IA
    ]);
  });

  it('rejects a table filed under the wrong domain', () => {
    expect(() =>
      SpecialistRegistry.fromDefinitions({
        ...DEFAULT_RULE_DEFINITIONS,
        [SpecialistDomain.IA]: DEFAULT_RULE_DEFINITIONS[SpecialistDomain.CUENTAS]
      })
    ).toThrow('Rule table registered for "ia" declares domain "cuentas"');
  });

  it('accepts additional rules as data only', () => {
    const registry = SpecialistRegistry.fromDefinitions({
      ...DEFAULT_RULE_DEFINITIONS,
      [SpecialistDomain.IA]: {
        domain: 'ia',
        title: 'IA',
        fallback: 'Lo siento.',
        rules: [{ id: 'bizum', keywords: ['bizum'], response: 'Bizum está disponible en la app.' }]
      }
    });

    expect(registry.get(SpecialistDomain.IA).answer('¿Tengo Bizum?')).toBe('Bizum está disponible en la app.');
  });
});
