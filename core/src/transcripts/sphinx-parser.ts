import type { Segment, Word } from '../types.js';

const ALTERNATE_PRONUNCIATION = /\(\d+\)$/;

function isBoundaryMarker(token: string): boolean {
  return (
    token === '<s>' ||
    token === '</s>' ||
    token === '<sil>' ||
    token === '[NOISE]' ||
    (token.startsWith('++') && token.endsWith('++'))
  );
}

/**
 * Parses phoneme-aligned `.transcript` output: one `word start end [confidence]`
 * entry per line. Silence and sentence markers close the current segment.
 */
export function parseSphinx(text: string, file: string): Segment[] {
  const segments: Segment[] = [];
  let words: Word[] = [];

  const flush = () => {
    if (words.length === 0) {
      return;
    }
    segments.push({
      file,
      start: words[0].start,
      end: words[words.length - 1].end,
      content: words.map((word) => word.word).join(' '),
      words,
    });
    words = [];
  };

  for (const rawLine of text.split(/\r?\n/)) {
    const fields = rawLine.trim().split(/\s+/);
    if (fields.length < 3) {
      continue;
    }
    const [token, startField, endField] = fields;
    if (isBoundaryMarker(token)) {
      flush();
      continue;
    }
    const start = Number(startField);
    const end = Number(endField);
    if (!Number.isFinite(start) || !Number.isFinite(end)) {
      throw new Error(`Malformed transcript line: "${rawLine.trim()}"`);
    }
    const confidence = fields.length > 3 ? Number(fields[3]) : 1;
    words.push({
      word: token.replace(ALTERNATE_PRONUNCIATION, ''),
      start,
      end,
      confidence: Number.isFinite(confidence) ? Math.min(1, Math.max(0, confidence)) : 1,
    });
  }
  flush();

  return segments;
}
