/**
 * Rule tables: the data each specialist answers from
 */

import { z } from 'zod';
import { normalizeText } from './normalize';

export interface Rule {
  readonly id: string;
  /** Zero-based position in the table; lower wins ties. */
  readonly priority: number;
  /** Normalized trigger keywords or phrases. */
  readonly keywords: readonly string[];
  readonly response: string;
}

export interface RuleTable {
  readonly domain: string;
  readonly title: string;
  readonly description: string;
  readonly version: string;
  readonly rules: readonly Rule[];
  readonly fallback: string;
  /** Keywords that only count towards orchestrator classification. */
  readonly routingKeywords: readonly string[];
}

const keywordListSchema = z.array(z.string());

const ruleSchema = z.object({
  id: z.string().min(1),
  keywords: keywordListSchema.min(1),
  response: z.string().min(1)
});

export const ruleTableSchema = z
  .object({
    domain: z.string().min(1),
    title: z.string().min(1),
    description: z.string().default(''),
    version: z.string().default('1.0.0'),
    fallback: z.string().min(1),
    routingKeywords: keywordListSchema.default([]),
    rules: z.array(ruleSchema)
  })
  .superRefine((table, ctx) => {
    const seenIds = new Set<string>();

    table.rules.forEach((rule, index) => {
      if (seenIds.has(rule.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rules', index, 'id'],
          message: `Duplicate rule id "${rule.id}"`
        });
      }
      seenIds.add(rule.id);

      const seenKeywords = new Set<string>();
      rule.keywords.forEach((keyword, keywordIndex) => {
        const normalized = normalizeText(keyword);
        if (normalized.length === 0) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['rules', index, 'keywords', keywordIndex],
            message: 'Keyword is empty after normalization'
          });
        } else if (seenKeywords.has(normalized)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['rules', index, 'keywords', keywordIndex],
            message: `Keyword "${keyword}" repeats another keyword of rule "${rule.id}"`
          });
        }
        seenKeywords.add(normalized);
      });
    });

    table.routingKeywords.forEach((keyword, index) => {
      if (normalizeText(keyword).length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['routingKeywords', index],
          message: 'Keyword is empty after normalization'
        });
      }
    });
  });

export type RuleTableDefinition = z.input<typeof ruleTableSchema>;

export class RuleTableError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(source: string, issues: z.ZodIssue[]) {
    const summary = issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    super(`Invalid rule table ${source}: ${summary}`);
    this.name = 'RuleTableError';
    this.issues = issues;
  }
}

const unique = (values: string[]): string[] => Array.from(new Set(values));

/**
 * Validate a rule table definition and freeze it. Keywords are normalized
 * here so matching only ever compares normalized text.
 */
export function createRuleTable(definition: unknown, source = 'definition'): RuleTable {
  const parsed = ruleTableSchema.safeParse(definition);
  if (!parsed.success) {
    throw new RuleTableError(source, parsed.error.issues);
  }

  const { data } = parsed;
  const rules: Rule[] = data.rules.map((rule, priority) =>
    Object.freeze({
      id: rule.id,
      priority,
      keywords: Object.freeze(rule.keywords.map(normalizeText)),
      response: rule.response
    })
  );

  return Object.freeze({
    domain: data.domain,
    title: data.title,
    description: data.description,
    version: data.version,
    rules: Object.freeze(rules),
    fallback: data.fallback,
    routingKeywords: Object.freeze(unique(data.routingKeywords.map(normalizeText)))
  });
}
