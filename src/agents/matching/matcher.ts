import { Query } from '../types';
import { Rule, RuleTable } from './ruleTable';

export interface MatchResult {
  /** Winning rule, or null when the fallback applies. */
  rule: Rule | null;
  score: number;
  matchedKeywords: readonly string[];
}

export interface RuleScore {
  rule: Rule;
  score: number;
  matchedKeywords: string[];
}

/**
 * Keywords that occur as substrings of the normalized text.
 */
export function findKeywords(normalized: string, keywords: readonly string[]): string[] {
  return keywords.filter((keyword) => normalized.includes(keyword));
}

/**
 * Every rule with at least one keyword hit, in table order.
 */
export function scoreRules(query: Query, table: RuleTable): RuleScore[] {
  const scores: RuleScore[] = [];
  for (const rule of table.rules) {
    const matchedKeywords = findKeywords(query.normalized, rule.keywords);
    if (matchedKeywords.length > 0) {
      scores.push({ rule, score: matchedKeywords.length, matchedKeywords });
    }
  }
  return scores;
}

/**
 * Highest keyword count wins; on equal counts the earlier rule wins.
 */
export function selectRule(query: Query, table: RuleTable): MatchResult {
  let best: RuleScore | null = null;

  for (const candidate of scoreRules(query, table)) {
    if (best === null || candidate.score > best.score) {
      best = candidate;
    }
  }

  if (best === null) {
    return { rule: null, score: 0, matchedKeywords: [] };
  }

  return { rule: best.rule, score: best.score, matchedKeywords: best.matchedKeywords };
}
