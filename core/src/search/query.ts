import type { Logger } from '../logger.js';
import { escapeRegExp, splitWords } from '../strings.js';

const STRIPPED_PUNCTUATION = /[.?!,:"]+/g;

/**
 * Compiles a sentence query. With `exactMatch` the query is taken literally
 * and bounded by word boundaries; otherwise it is a case-insensitive regular
 * expression, falling back to a literal match when it does not compile.
 */
export function compileQuery(query: string, exactMatch: boolean, logger: Partial<Logger> = {}): RegExp {
  if (exactMatch) {
    return new RegExp(`\\b${escapeRegExp(query)}\\b`, 'i');
  }
  try {
    return new RegExp(query, 'i');
  } catch (error) {
    logger.debug?.('search.query.literalFallback', {
      query,
      reason: error instanceof Error ? error.message : String(error),
    });
    return new RegExp(escapeRegExp(query), 'i');
  }
}

/**
 * Compiles one token of a fragment query, matched against a single word.
 * Same rules as {@link compileQuery}.
 */
export function compileToken(token: string, exactMatch: boolean, logger: Partial<Logger> = {}): RegExp {
  return compileQuery(token, exactMatch, logger);
}

export function tokenizeQuery(query: string): string[] {
  return splitWords(query);
}

/** Lower-cases a transcript word and strips `.?!,:"` for mash comparison. */
export function normalizeWord(word: string): string {
  return word.toLowerCase().replace(STRIPPED_PUNCTUATION, '');
}
