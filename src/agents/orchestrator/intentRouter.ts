/**
 * Intent router: decides which specialist owns a query and delegates to it
 */

import { logger } from '../../config/logger';
import { IssuedToken, TokenAuthority } from '../../auth/tokenAuthority';
import { DEFAULT_DOMAIN, Query, ROUTING_PRIORITY, SpecialistDomain } from '../types';
import { toQuery } from '../matching/normalize';
import { findKeywords } from '../matching/matcher';
import { SpecialistRegistry } from '../specialists';
import { ClassificationResult, RoutedAnswer, SpecialistClients } from './types';

export class IntentRouter {
  constructor(
    private readonly registry: SpecialistRegistry,
    private readonly clients: SpecialistClients,
    private readonly authority: TokenAuthority
  ) {}

  public issueToken(): IssuedToken {
    return this.authority.issue();
  }

  /**
   * A domain scores the higher of its best rule's keyword count and its
   * routing-keyword count. Highest score wins; ties go to the earlier domain
   * in ROUTING_PRIORITY. Nothing matched means the default domain.
   */
  public classify(input: string | Query): ClassificationResult {
    const query = toQuery(input);
    const scores: Record<SpecialistDomain, number> = {
      [SpecialistDomain.CONSULTAS]: 0,
      [SpecialistDomain.CUENTAS]: 0,
      [SpecialistDomain.IDENTIDAD]: 0,
      [SpecialistDomain.IA]: 0
    };

    let winner: SpecialistDomain = DEFAULT_DOMAIN;
    let best = 0;

    for (const domain of ROUTING_PRIORITY) {
      const responder = this.registry.get(domain);
      const ruleScore = responder.match(query).score;
      const hintScore = findKeywords(query.normalized, responder.table.routingKeywords).length;
      const score = Math.max(ruleScore, hintScore);

      scores[domain] = score;
      if (score > best) {
        best = score;
        winner = domain;
      }
    }

    const total = Object.values(scores).reduce((sum, score) => sum + score, 0);
    const confidence = total > 0 ? Math.round((best / total) * 100) / 100 : 0;

    return {
      domain: winner,
      confidence,
      score: best,
      matched: best > 0,
      scores
    };
  }

  /**
   * Classify and delegate. The specialist's answer is returned untouched,
   * including its fallback when it does not understand the query.
   */
  public async route(input: string | Query): Promise<RoutedAnswer> {
    const query = toQuery(input);
    const classification = this.classify(query);

    logger.info('Routing query', {
      domain: classification.domain,
      confidence: classification.confidence,
      matched: classification.matched,
      scores: classification.scores
    });

    const respuesta = await this.clients[classification.domain].ask(query.raw);

    return {
      domain: classification.domain,
      classification,
      respuesta
    };
  }
}
