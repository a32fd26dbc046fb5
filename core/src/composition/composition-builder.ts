import { DEFAULT_PADDING, MASH_PADDING } from '../config.js';
import type { Logger } from '../logger.js';
import { shuffleInPlace } from '../random.js';
import type { Composition, Match, RandomSource, SearchType } from '../types.js';

export interface BuildCompositionOptions {
  /** Seconds added before and after each match. Defaults by search type. */
  padding?: number;
  /** Seconds every match is shifted by (negative moves earlier). */
  resync?: number;
  randomize?: boolean;
  /** Keep at most this many clips; 0 or undefined keeps all. */
  maxClips?: number;
  searchType?: SearchType;
  random?: RandomSource;
  logger?: Partial<Logger>;
}

/**
 * Padding used when the caller gives none: word-level cuts get a little
 * breathing room, whole sentences none.
 */
export function resolveDefaultPadding(searchType?: SearchType): number {
  switch (searchType) {
    case 'fragment':
      return DEFAULT_PADDING;
    case 'mash':
      return MASH_PADDING;
    default:
      return 0;
  }
}

/**
 * Merges overlapping matches of the same file. One pass over the matches
 * sorted by start: a match is folded into the previous output entry when both
 * share a file and the previous one ends at or after its start. The input is
 * not modified.
 */
export function removeOverlaps(matches: readonly Match[]): Composition {
  const sorted = [...matches].sort((a, b) => a.start - b.start);
  const out: Composition = [];
  for (const match of sorted) {
    const previous = out.length > 0 ? out[out.length - 1] : undefined;
    if (previous && previous.file === match.file && previous.end >= match.start) {
      previous.end = Math.max(previous.end, match.end);
    } else {
      out.push({ ...match });
    }
  }
  return out;
}

/**
 * Pads and shifts copies of the matches, clamps times at zero and merges the
 * overlaps this creates.
 */
export function padAndSync(matches: readonly Match[], padding = 0, resync = 0): Composition {
  const adjusted = matches.map((match) => ({
    ...match,
    start: Math.max(0, match.start - padding + resync),
    end: Math.max(0, match.end + padding + resync),
  }));
  return removeOverlaps(adjusted);
}

/**
 * Turns raw search matches into a renderable composition: pad and resync,
 * merge overlaps, optionally shuffle, then cap the clip count.
 */
export function buildComposition(matches: readonly Match[], options: BuildCompositionOptions = {}): Composition {
  const padding = options.padding ?? resolveDefaultPadding(options.searchType);
  let composition = padAndSync(matches, padding, options.resync ?? 0);

  if (options.randomize) {
    shuffleInPlace(composition, options.random ?? Math.random);
  }

  if (options.maxClips !== undefined && options.maxClips > 0) {
    composition = composition.slice(0, options.maxClips);
  }

  options.logger?.debug?.('composition.built', {
    matches: matches.length,
    clips: composition.length,
    padding,
    resync: options.resync ?? 0,
  });
  return composition;
}
