import { WarningCode } from './errors/index.js';
import type { Logger } from './logger.js';
import { splitWords } from './strings.js';
import type { Segment, Word } from './types.js';

export interface SynthesizeOptions {
  /** Media file recorded on every returned word. */
  file?: string;
  logger?: Partial<Logger>;
}

/**
 * Returns the word sequence of a transcript.
 *
 * Segments that carry recogniser word timing keep it. For the others each
 * word gets an equal share of its segment's duration: word i of n spans
 * `[start + i*d/n, start + (i+1)*d/n)`. This is an approximation and is
 * flagged with confidence 0.
 */
export function synthesizeWordTimestamps(segments: readonly Segment[], options: SynthesizeOptions = {}): Word[] {
  const { file, logger } = options;
  const words: Word[] = [];
  let synthesizedSegments = 0;

  for (const segment of segments) {
    if (segment.words) {
      for (const word of segment.words) {
        words.push(file === undefined ? { ...word } : { ...word, file });
      }
      continue;
    }

    const tokens = splitWords(segment.content);
    if (tokens.length === 0) {
      continue;
    }
    synthesizedSegments += 1;
    const step = (segment.end - segment.start) / tokens.length;
    tokens.forEach((token, index) => {
      const word: Word = {
        word: token,
        start: segment.start + index * step,
        end: segment.start + (index + 1) * step,
        confidence: 0,
      };
      if (file !== undefined) {
        word.file = file;
      }
      words.push(word);
    });
  }

  if (synthesizedSegments > 0) {
    logger?.info?.('words.synthesized', {
      code: WarningCode.SYNTHESIZED_WORD_TIMESTAMPS,
      file,
      segments: synthesizedSegments,
    });
  }

  return words;
}
