/**
 * Specialist registry: one responder per domain, built from the JSON rule
 * tables next to this file.
 */

import { SPECIALIST_DOMAINS, SpecialistDomain } from '../types';
import { createRuleTable } from '../matching/ruleTable';
import { SpecialistResponder } from './specialistResponder';
import consultasRules from './rules/consultas.json';
import cuentasRules from './rules/cuentas.json';
import identidadRules from './rules/identidad.json';
import iaRules from './rules/ia.json';

export { SpecialistResponder } from './specialistResponder';

export type RuleDefinitions = Record<SpecialistDomain, unknown>;

export const DEFAULT_RULE_DEFINITIONS: RuleDefinitions = {
  [SpecialistDomain.CONSULTAS]: consultasRules,
  [SpecialistDomain.CUENTAS]: cuentasRules,
  [SpecialistDomain.IDENTIDAD]: identidadRules,
  [SpecialistDomain.IA]: iaRules
};

export class SpecialistRegistry {
  private constructor(private readonly responders: ReadonlyMap<SpecialistDomain, SpecialistResponder>) {}

  static fromDefinitions(definitions: RuleDefinitions): SpecialistRegistry {
    const responders = new Map<SpecialistDomain, SpecialistResponder>();

    for (const domain of SPECIALIST_DOMAINS) {
      const table = createRuleTable(definitions[domain], `${domain}.json`);
      if (table.domain !== domain) {
        throw new Error(`Rule table registered for "${domain}" declares domain "${table.domain}"`);
      }
      responders.set(domain, new SpecialistResponder(table));
    }

    return new SpecialistRegistry(responders);
  }

  public get(domain: SpecialistDomain): SpecialistResponder {
    const responder = this.responders.get(domain);
    if (!responder) {
      throw new Error(`No specialist registered for domain "${domain}"`);
    }
    return responder;
  }

  public domains(): SpecialistDomain[] {
    return Array.from(this.responders.keys());
  }
}

export const createDefaultRegistry = (): SpecialistRegistry =>
  SpecialistRegistry.fromDefinitions(DEFAULT_RULE_DEFINITIONS);
