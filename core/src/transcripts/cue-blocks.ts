import type { Segment } from '../types.js';
import { parseTimingLine } from './timestamps.js';

const MARKUP_TAG = /<[^>]+>/g;

/**
 * Parses cue text where each `start --> end` line opens a segment and the
 * following text lines are joined with single spaces. A blank line closes the
 * current cue, so numeric cue identifiers before a timing line are dropped.
 */
export function parseCueBlocks(text: string, file: string): Segment[] {
  const segments: Segment[] = [];
  let current: { start: number; end: number; lines: string[] } | null = null;

  const flush = () => {
    if (!current) {
      return;
    }
    const content = current.lines.join(' ').replace(/\s+/g, ' ').trim();
    if (content.length > 0) {
      segments.push({ file, start: current.start, end: current.end, content });
    }
    current = null;
  };

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0) {
      flush();
      continue;
    }
    const timing = parseTimingLine(line);
    if (timing) {
      flush();
      current = { start: timing.start, end: timing.end, lines: [] };
      continue;
    }
    if (current) {
      current.lines.push(line.replace(MARKUP_TAG, ''));
    }
  }
  flush();

  return segments;
}
