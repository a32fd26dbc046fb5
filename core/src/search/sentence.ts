import type { Match, Segment } from '../types.js';

/**
 * Returns each segment of one file whose content matches any pattern, once,
 * ordered by start time. Matches are attributed to `file`, the media being
 * searched, since one transcript may serve several media files.
 */
export function searchSentences(segments: readonly Segment[], patterns: readonly RegExp[], file: string): Match[] {
  const matches: Match[] = [];
  for (const segment of segments) {
    if (patterns.some((pattern) => pattern.test(segment.content))) {
      matches.push({
        file,
        start: segment.start,
        end: segment.end,
        content: segment.content,
      });
    }
  }
  // Array#sort is stable, so equal starts keep transcript order
  return matches.sort((a, b) => a.start - b.start);
}
