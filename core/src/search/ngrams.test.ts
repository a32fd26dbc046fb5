import { describe, it, expect } from 'vitest';
import { countNgrams, getNgrams, loadDefaultIgnoredWords } from './ngrams.js';
import { ok } from '../types.js';
import type { Segment } from '../types.js';
import type { TranscriptStore } from '../transcripts/transcript-store.js';

function createFakeStore(transcripts: Record<string, Segment[]>): TranscriptStore {
  return {
    findTranscript: async (mediaPath) => (mediaPath in transcripts ? `${mediaPath}.json` : null),
    loadTranscript: async (mediaPath) => ok(transcripts[mediaPath] ?? []),
    parseTranscript: async (mediaPath) => transcripts[mediaPath] ?? null,
    clearCache: () => {},
  };
}

describe('getNgrams', () => {
  const store = createFakeStore({
    'talk.mp4': [{ file: 'talk.mp4', start: 0, end: 2, content: 'Hello, world. Hello world!' }],
    'timed.mp4': [
      {
        file: 'timed.mp4',
        start: 0,
        end: 2,
        content: 'ignored content',
        words: [
          { word: 'big', start: 0, end: 0.5, confidence: 1 },
          { word: 'red', start: 0.5, end: 1, confidence: 1 },
          { word: 'dog', start: 1, end: 2, confidence: 1 },
        ],
      },
    ],
  });

  it('splits segment content on punctuation and whitespace', async () => {
    const ngrams = await getNgrams(store, ['talk.mp4'], 2);

    expect(ngrams).toEqual([
      ['Hello', 'world'],
      ['world', 'Hello'],
      ['Hello', 'world'],
    ]);
  });

  it('prefers timed words over segment content', async () => {
    expect(await getNgrams(store, ['timed.mp4'], 2)).toEqual([
      ['big', 'red'],
      ['red', 'dog'],
    ]);
  });

  it('joins words across files in order and skips missing transcripts', async () => {
    expect(await getNgrams(store, ['timed.mp4', 'missing.mp4', 'talk.mp4'], 1)).toEqual([
      ['big'],
      ['red'],
      ['dog'],
      ['Hello'],
      ['world'],
      ['Hello'],
      ['world'],
    ]);
  });

  it('drops n-grams containing an ignored word, case-insensitively', async () => {
    expect(await getNgrams(store, ['timed.mp4'], 2, { ignoredWords: ['RED'] })).toEqual([]);
  });

  it('returns nothing when n exceeds the word count', async () => {
    expect(await getNgrams(store, ['timed.mp4'], 4)).toEqual([]);
  });
});

describe('countNgrams', () => {
  it('orders by count with ties in first-seen order', () => {
    const counts = countNgrams([['a', 'b'], ['c', 'd'], ['a', 'b'], ['e', 'f'], ['c', 'd'], ['a', 'b']]);

    expect(counts).toEqual([
      { ngram: ['a', 'b'], count: 3 },
      { ngram: ['c', 'd'], count: 2 },
      { ngram: ['e', 'f'], count: 1 },
    ]);
  });

  it('limits the report', () => {
    expect(countNgrams([['x'], ['y'], ['y']], 1)).toEqual([{ ngram: ['y'], count: 2 }]);
  });
});

describe('loadDefaultIgnoredWords', () => {
  it('reads the bundled stopword list', () => {
    const words = loadDefaultIgnoredWords();

    expect(words).toContain('the');
    expect(words).toContain('um');
    expect(words.every((word) => word === word.toLowerCase())).toBe(true);
  });
});
