/** A single timed word inside a transcript segment. */
export interface Word {
  word: string;
  /** Start time in seconds */
  start: number;
  /** End time in seconds */
  end: number;
  /** Recogniser confidence in [0, 1]; 0 marks synthesized timing */
  confidence: number;
  /** Source media file, added when words are flattened for search */
  file?: string;
}

/** One line/sentence of a transcript. */
export interface Segment {
  file: string;
  start: number;
  end: number;
  content: string;
  words?: Word[];
}

/** A search hit. Shaped like a segment; semantic hits carry a similarity score. */
export interface Match extends Segment {
  score?: number;
}

/** Ordered, overlap-free sequence of matches ready for rendering. */
export type Composition = Match[];

/** The four search strategies. */
export const SEARCH_TYPES = ['sentence', 'fragment', 'mash', 'semantic'] as const;

export type SearchType = (typeof SEARCH_TYPES)[number];

export function isSearchType(value: string): value is SearchType {
  return SEARCH_TYPES.some((candidate) => candidate === value);
}

export type MediaType = 'video' | 'audio' | 'unknown';

export type ExportStrategy = 'video' | 'audio';

/**
 * Source of uniformly distributed numbers in [0, 1).
 * `Math.random` is the default; tests inject a seeded source.
 */
export type RandomSource = () => number;

export type Result<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export interface FailedItem<I, E extends Error = Error> {
  item: I;
  error: E;
}

/** Per-item aggregation of an operation applied to many inputs. */
export interface ItemSummary<I, T, E extends Error = Error> {
  succeeded: T[];
  failed: FailedItem<I, E>[];
}

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): Result<never, E> {
  return { ok: false, error };
}
