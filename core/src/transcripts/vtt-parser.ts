import type { Segment, Word } from '../types.js';
import { splitWords } from '../strings.js';
import { parseCueBlocks } from './cue-blocks.js';
import { parseTimestamp, parseTimingLine, TIMESTAMP_PATTERN } from './timestamps.js';
import type { TimingLine } from './timestamps.js';

const INLINE_TIMESTAMP = new RegExp(`<(${TIMESTAMP_PATTERN.source})>`);
const INLINE_TIMESTAMP_SPLIT = new RegExp(`<(${TIMESTAMP_PATTERN.source})>`, 'g');
/** Any tag that is not an inline word timestamp, e.g. `<c>`, `</c>`, `<i>`. */
const STYLING_TAG = new RegExp(`<(?!${TIMESTAMP_PATTERN.source}>)/?[^>]*>`, 'g');

/**
 * Parses WebVTT. Auto-generated captions with inline `<HH:MM:SS.mmm>` word
 * tags produce segments with word timing; plain cues produce segments only.
 */
export function parseVtt(text: string, file: string): Segment[] {
  // Each tagged line belongs to the closest timing line above it; plain
  // caption text in between (which may itself contain `10:30`) is ignored.
  const cues: Array<[TimingLine, string]> = [];
  let pending: TimingLine | null = null;
  for (const line of text.split(/\r?\n/).map((raw) => raw.trim())) {
    const timing = parseTimingLine(line);
    if (timing) {
      pending = timing;
    } else if (pending && INLINE_TIMESTAMP.test(line)) {
      cues.push([pending, line]);
      pending = null;
    }
  }

  if (cues.length === 0) {
    return parseCueBlocks(text, file);
  }

  const segments: Segment[] = [];
  for (const [timing, taggedLine] of cues) {
    const segment = parseTaggedCue(timing, taggedLine, file);
    if (segment) {
      segments.push(segment);
    }
  }
  return segments;
}

function parseTaggedCue(timing: TimingLine, taggedLine: string, file: string): Segment | null {
  const clean = taggedLine.replace(STYLING_TAG, '');
  // With one capture group, split yields [text, time, text, time, ..., text]
  const parts = clean.split(INLINE_TIMESTAMP_SPLIT);
  const words: Word[] = [];
  let current = timing.start;

  for (let i = 0; i < parts.length; i += 2) {
    const nextStamp = i + 1 < parts.length ? parseTimestamp(parts[i + 1]) : null;
    const next = nextStamp ?? timing.end;
    const tokens = splitWords(parts[i]);
    const step = (next - current) / Math.max(tokens.length, 1);

    tokens.forEach((token, index) => {
      words.push({
        word: token,
        start: current + index * step,
        end: index === tokens.length - 1 ? next : current + (index + 1) * step,
        confidence: 1,
      });
    });

    if (nextStamp !== null) {
      current = nextStamp;
    }
  }

  if (words.length === 0) {
    return null;
  }

  return {
    file,
    start: timing.start,
    end: timing.end,
    content: words.map((word) => word.word).join(' '),
    words,
  };
}
