import { readFileSync } from 'node:fs';
import { MAX_REPORTED_NGRAMS } from '../config.js';
import type { TranscriptStore } from '../transcripts/transcript-store.js';

export type Ngram = string[];

export interface NgramCount {
  ngram: Ngram;
  count: number;
}

export interface NgramOptions {
  /** Words that exclude any n-gram containing them (case-insensitive). */
  ignoredWords?: readonly string[];
  preferredExt?: string;
}

const CONTENT_SPLIT = /[.?!,:"]+\s*|\s+/;

let defaultIgnoredWords: string[] | undefined;

/** Common filler and function words, read from `data/ignored-words.json`. */
export function loadDefaultIgnoredWords(): string[] {
  if (!defaultIgnoredWords) {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../data/ignored-words.json', import.meta.url), 'utf8'));
    if (!Array.isArray(raw) || !raw.every((entry): entry is string => typeof entry === 'string')) {
      throw new Error('data/ignored-words.json must be an array of strings');
    }
    defaultIgnoredWords = raw;
  }
  return defaultIgnoredWords;
}

/**
 * Collects consecutive n-word tuples across the transcripts of `files`, in
 * order. Real word timing is used when present, else segment content is split
 * on punctuation and whitespace. Files without a transcript are skipped.
 */
export async function getNgrams(
  store: TranscriptStore,
  files: readonly string[],
  n: number,
  options: NgramOptions = {},
): Promise<Ngram[]> {
  const words: string[] = [];
  for (const file of files) {
    const segments = await store.parseTranscript(file, options.preferredExt);
    if (!segments) {
      continue;
    }
    for (const segment of segments) {
      if (segment.words) {
        words.push(...segment.words.map((word) => word.word));
      } else {
        words.push(...segment.content.split(CONTENT_SPLIT).filter((word) => word.length > 0));
      }
    }
  }

  const ignored = new Set((options.ignoredWords ?? []).map((word) => word.toLowerCase()));
  const ngrams: Ngram[] = [];
  for (let i = 0; i + n <= words.length; i += 1) {
    const ngram = words.slice(i, i + n);
    if (!ngram.some((word) => ignored.has(word.toLowerCase()))) {
      ngrams.push(ngram);
    }
  }
  return ngrams;
}

/**
 * The most common n-grams with their counts, highest first. Equal counts keep
 * first-seen order.
 */
export function countNgrams(ngrams: readonly Ngram[], limit = MAX_REPORTED_NGRAMS): NgramCount[] {
  const counts = new Map<string, NgramCount>();
  for (const ngram of ngrams) {
    const key = ngram.join(' ');
    const entry = counts.get(key);
    if (entry) {
      entry.count += 1;
    } else {
      counts.set(key, { ngram, count: 1 });
    }
  }
  return [...counts.values()].sort((a, b) => b.count - a.count).slice(0, limit);
}
