import {
  countNgrams,
  createTranscriptStore,
  getNgrams,
  loadDefaultIgnoredWords,
  type Logger,
  type NgramCount,
  type TranscriptStore,
} from '@transcut/core';

export interface NgramsCommandOptions {
  files: string[];
  n: number;
  /** Drop n-grams containing a stopword. */
  filter: boolean;
  /** Overrides the bundled stopword list when filtering. */
  ignoredWords?: string[];
  preferredExt?: string;
  limit?: number;
  store?: TranscriptStore;
  logger?: Partial<Logger>;
}

export async function runNgrams(options: NgramsCommandOptions): Promise<NgramCount[]> {
  if (!Number.isInteger(options.n) || options.n < 1) {
    throw new Error(`--n must be a positive integer (received ${options.n}).`);
  }
  const store = options.store ?? createTranscriptStore({ logger: options.logger });
  const ignoredWords = options.filter ? (options.ignoredWords ?? loadDefaultIgnoredWords()) : [];
  const ngrams = await getNgrams(store, options.files, options.n, {
    ignoredWords,
    preferredExt: options.preferredExt,
  });
  return countNgrams(ngrams, options.limit);
}
