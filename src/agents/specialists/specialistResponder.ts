import { logger } from '../../config/logger';
import { Query } from '../types';
import { toQuery } from '../matching/normalize';
import { MatchResult, selectRule } from '../matching/matcher';
import { RuleTable } from '../matching/ruleTable';

/**
 * Answers queries from a single rule table. Always produces text: when no
 * rule matches the table's fallback is returned.
 */
export class SpecialistResponder {
  constructor(public readonly table: RuleTable) {}

  get domain(): string {
    return this.table.domain;
  }

  public match(input: string | Query): MatchResult {
    return selectRule(toQuery(input), this.table);
  }

  public answer(input: string | Query): string {
    const query = toQuery(input);
    const result = this.match(query);

    logger.debug('Specialist match', {
      domain: this.domain,
      normalized: query.normalized,
      rule: result.rule?.id ?? null,
      score: result.score,
      matchedKeywords: result.matchedKeywords
    });

    return result.rule ? result.rule.response : this.table.fallback;
  }
}
