import { Query } from '../types';

const COMBINING_MARKS = /\p{Mn}/gu;
// Anything that is not a letter, digit or whitespace: ¿ ? ¡ ! , . € etc.
const PUNCTUATION = /[^\p{L}\p{N}\s]/gu;
const WHITESPACE = /\s+/g;

/**
 * Lowercase, strip diacritics, turn punctuation into spaces, collapse
 * whitespace and trim. "¿Qué tipo de cuenta ofrecéis?" becomes
 * "que tipo de cuenta ofreceis".
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .normalize('NFD')
    .replace(COMBINING_MARKS, '')
    .replace(PUNCTUATION, ' ')
    .replace(WHITESPACE, ' ')
    .trim();
}

export function createQuery(raw: string): Query {
  return { raw, normalized: normalizeText(raw) };
}

export function toQuery(input: string | Query): Query {
  return typeof input === 'string' ? createQuery(input) : input;
}
