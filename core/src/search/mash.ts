import { SearchErrorCode } from '../errors/index.js';
import type { Logger } from '../logger.js';
import { pickRandom } from '../random.js';
import type { Match, RandomSource, Word } from '../types.js';
import { normalizeWord, tokenizeQuery } from './query.js';

export interface FileWords {
  file: string;
  words: readonly Word[];
}

/**
 * Builds a word-by-word "mash": for every token of every query, one randomly
 * chosen occurrence of that word anywhere in the files. If any token never
 * occurs the result is empty.
 */
export function searchMash(
  sources: readonly FileWords[],
  queries: readonly string[],
  random: RandomSource,
  logger: Partial<Logger> = {},
): Match[] {
  const index = new Map<string, Array<{ file: string; word: Word }>>();
  for (const { file, words } of sources) {
    for (const word of words) {
      const key = normalizeWord(word.word);
      const bucket = index.get(key);
      if (bucket) {
        bucket.push({ file, word });
      } else {
        index.set(key, [{ file, word }]);
      }
    }
  }

  const matches: Match[] = [];
  for (const query of queries) {
    for (const token of tokenizeQuery(query)) {
      const choice = pickRandom(index.get(normalizeWord(token)) ?? [], random);
      if (!choice) {
        logger.warn?.('search.mash.tokenMissing', {
          code: SearchErrorCode.MASH_TOKEN_MISSING,
          token,
        });
        return [];
      }
      matches.push({
        file: choice.file,
        start: choice.word.start,
        end: choice.word.end,
        content: choice.word.word,
      });
    }
  }
  return matches;
}
