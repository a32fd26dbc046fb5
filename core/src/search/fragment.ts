import type { Logger } from '../logger.js';
import type { Match, Word } from '../types.js';
import { compileToken, tokenizeQuery } from './query.js';

/**
 * Slides a window the length of each query over one file's words. A window
 * matches when every token matches the word at its position.
 */
export function searchFragments(
  words: readonly Word[],
  queries: readonly string[],
  file: string,
  exactMatch: boolean,
  logger: Partial<Logger> = {},
): Match[] {
  const matches: Match[] = [];

  for (const query of queries) {
    const patterns = tokenizeQuery(query).map((token) => compileToken(token, exactMatch, logger));
    if (patterns.length === 0) {
      continue;
    }

    for (let i = 0; i + patterns.length <= words.length; i += 1) {
      const window = words.slice(i, i + patterns.length);
      if (patterns.every((pattern, j) => pattern.test(window[j].word))) {
        matches.push({
          file,
          start: window[0].start,
          end: window[window.length - 1].end,
          content: window.map((word) => word.word).join(' '),
        });
      }
    }
  }

  return matches;
}
