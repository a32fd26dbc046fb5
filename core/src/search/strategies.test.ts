import { describe, it, expect, vi } from 'vitest';
import { compileQuery, compileToken, normalizeWord } from './query.js';
import { searchSentences } from './sentence.js';
import { searchFragments } from './fragment.js';
import { searchMash } from './mash.js';
import { cosineSimilarity, rankBySimilarity } from './semantic.js';
import type { Segment, Word } from '../types.js';

function word(text: string, start: number, end: number): Word {
  return { word: text, start, end, confidence: 1 };
}

describe('compileQuery', () => {
  it('is case-insensitive', () => {
    expect(compileQuery('HELLO', false).test('well hello there')).toBe(true);
  });

  it('treats the query as a regular expression', () => {
    expect(compileQuery('colou?r', false).test('Colour')).toBe(true);
  });

  it('falls back to a literal match for invalid expressions', () => {
    const debug = vi.fn();
    const pattern = compileQuery('what (is', false, { debug });

    expect(pattern.test('so what (is this')).toBe(true);
    expect(debug).toHaveBeenCalledWith('search.query.literalFallback', expect.objectContaining({ query: 'what (is' }));
  });

  it('bounds exact matches by word boundaries and escapes them', () => {
    const pattern = compileQuery('cat', true);
    expect(pattern.test('the cat sat')).toBe(true);
    expect(pattern.test('concatenate')).toBe(false);
    expect(compileQuery('a.b', true).test('axb')).toBe(false);
  });
});

describe('compileToken', () => {
  it('matches substrings unless exact', () => {
    expect(compileToken('go', false).test('Going')).toBe(true);
    expect(compileToken('go', true).test('Going')).toBe(false);
    expect(compileToken('go', true).test('go,')).toBe(true);
  });

  it('treats the token as a regular expression unless exact', () => {
    expect(compileToken('colou?r', false).test('Color')).toBe(true);
    expect(compileToken('colou?r', true).test('Color')).toBe(false);
    expect(compileToken('a.b', true).test('axb')).toBe(false);
  });

  it('falls back to a literal match for invalid expressions', () => {
    expect(compileToken('(oops', false).test('(oops!')).toBe(true);
  });
});

describe('normalizeWord', () => {
  it('lower-cases and strips sentence punctuation', () => {
    expect(normalizeWord('"Hello,"')).toBe('hello');
    expect(normalizeWord('Why?!')).toBe('why');
    expect(normalizeWord("don't")).toBe("don't");
  });
});

describe('searchSentences', () => {
  it('returns the whole segment for a match', () => {
    const segments: Segment[] = [{ file: 'f.mp4', start: 0.0, end: 4.7, content: 'Prometo ser o concerto' }];

    expect(searchSentences(segments, [compileQuery('concerto', false)], 'f.mp4')).toEqual([
      { file: 'f.mp4', start: 0, end: 4.7, content: 'Prometo ser o concerto' },
    ]);
  });

  it('returns a segment once even when several queries match', () => {
    const segments: Segment[] = [{ file: 'f.mp4', start: 1, end: 2, content: 'red and blue' }];
    const patterns = [compileQuery('red', false), compileQuery('blue', false)];

    expect(searchSentences(segments, patterns, 'f.mp4')).toHaveLength(1);
  });

  it('orders matches by start time', () => {
    const segments: Segment[] = [
      { file: 'f.mp4', start: 5, end: 6, content: 'later hit' },
      { file: 'f.mp4', start: 1, end: 2, content: 'early hit' },
      { file: 'f.mp4', start: 3, end: 4, content: 'miss' },
    ];

    expect(searchSentences(segments, [compileQuery('hit', false)], 'f.mp4').map((m) => m.start)).toEqual([1, 5]);
  });
});

describe('searchFragments', () => {
  const words = [
    word('They', 16.2, 16.78),
    word('Suicidal', 16.78, 17.3),
    word('Tendencies', 17.3, 17.96),
    word('rule', 17.96, 18.4),
  ];

  it('matches consecutive words and spans first start to last end', () => {
    expect(searchFragments(words, ['Suicidal Tendencies'], 'f.mp4', false)).toEqual([
      { file: 'f.mp4', start: 16.78, end: 17.96, content: 'Suicidal Tendencies' },
    ]);
  });

  it('returns contents of exactly two consecutive words for a two-token query', () => {
    const sequence = [word('a', 0, 1), word('b', 1, 2), word('a', 2, 3), word('b', 3, 4), word('c', 4, 5)];
    const matches = searchFragments(sequence, ['a b'], 'f.mp4', true);

    expect(matches).toEqual([
      { file: 'f.mp4', start: 0, end: 2, content: 'a b' },
      { file: 'f.mp4', start: 2, end: 4, content: 'a b' },
    ]);
  });

  it('keeps original casing and punctuation in content', () => {
    const sequence = [word('Hello,', 0, 0.5), word('World!', 0.5, 1)];

    expect(searchFragments(sequence, ['hello world'], 'f.mp4', true)[0].content).toBe('Hello, World!');
  });

  it('matches each token as a regular expression against its word', () => {
    const sequence = [word('Colour', 0, 0.4), word('fixing', 0.4, 1), word('color', 2, 2.5), word('fix', 2.5, 3)];

    expect(searchFragments(sequence, ['colou?r fix.*'], 'f.mp4', false)).toEqual([
      { file: 'f.mp4', start: 0, end: 1, content: 'Colour fixing' },
      { file: 'f.mp4', start: 2, end: 3, content: 'color fix' },
    ]);
  });

  it('returns nothing when the query is longer than the word list', () => {
    expect(searchFragments([word('one', 0, 1)], ['one two'], 'f.mp4', false)).toEqual([]);
  });
});

describe('searchMash', () => {
  const sources = [
    { file: 'a.mp4', words: [word('Hello,', 0, 0.5), word('there', 0.5, 1), word('hello', 4, 4.5)] },
    { file: 'b.mp4', words: [word('World.', 2, 2.6)] },
  ];

  it('picks one occurrence per token in token order', () => {
    const matches = searchMash(sources, ['hello world'], () => 0);

    expect(matches).toEqual([
      { file: 'a.mp4', start: 0, end: 0.5, content: 'Hello,' },
      { file: 'b.mp4', start: 2, end: 2.6, content: 'World.' },
    ]);
  });

  it('normalises punctuation in query tokens', () => {
    expect(searchMash(sources, ['hello, world!'], () => 0).map((m) => m.content)).toEqual(['Hello,', 'World.']);
  });

  it('uses the random source to choose among occurrences', () => {
    const [first] = searchMash(sources, ['hello'], () => 0.75);

    expect(first).toEqual({ file: 'a.mp4', start: 4, end: 4.5, content: 'hello' });
  });

  it('returns nothing at all when any token is missing', () => {
    const warn = vi.fn();

    expect(searchMash(sources, ['hello', 'nowhere world'], () => 0, { warn })).toEqual([]);
    expect(warn).toHaveBeenCalledWith('search.mash.tokenMissing', { code: 'S003', token: 'nowhere' });
  });
});

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors and 0 for orthogonal ones', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('is 0 when a vector is all zeros', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});

describe('rankBySimilarity', () => {
  const seg = (content: string, start: number): Segment => ({ file: 'f.mp4', start, end: start + 1, content });

  it('keeps scores at or above the threshold, best first', () => {
    const matches = rankBySimilarity(
      [[1, 0]],
      [
        { file: 'f.mp4', segment: seg('weak', 0), vector: [1, 1] },
        { file: 'f.mp4', segment: seg('strong', 1), vector: [1, 0] },
        { file: 'f.mp4', segment: seg('none', 2), vector: [0, 1] },
      ],
      0.5,
    );

    expect(matches.map((m) => m.content)).toEqual(['strong', 'weak']);
    expect(matches[0].score).toBe(1);
    expect(matches[1].score).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it('keeps encounter order for equal scores', () => {
    const matches = rankBySimilarity(
      [[1, 0], [0, 1]],
      [
        { file: 'f.mp4', segment: seg('x', 0), vector: [1, 0] },
        { file: 'f.mp4', segment: seg('y', 1), vector: [0, 1] },
      ],
      0.9,
    );

    expect(matches.map((m) => m.content)).toEqual(['x', 'y']);
  });
});
