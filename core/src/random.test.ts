import { describe, it, expect } from 'vitest';
import { createSeededRandom, pickRandom, shuffleInPlace } from './random.js';

describe('createSeededRandom', () => {
  it('produces the same sequence for the same seed', () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    const first = [a(), a(), a(), a()];
    const second = [b(), b(), b(), b()];
    expect(first).toEqual(second);
  });

  it('produces different sequences for different seeds', () => {
    const a = createSeededRandom(1);
    const b = createSeededRandom(2);
    expect(a()).not.toBe(b());
  });

  it('stays within [0, 1)', () => {
    const random = createSeededRandom(7);
    for (let i = 0; i < 1000; i += 1) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('pickRandom', () => {
  it('returns undefined for an empty list', () => {
    expect(pickRandom([], () => 0.5)).toBeUndefined();
  });

  it('maps the random value onto an index', () => {
    const items = ['a', 'b', 'c', 'd'];
    expect(pickRandom(items, () => 0)).toBe('a');
    expect(pickRandom(items, () => 0.5)).toBe('c');
    expect(pickRandom(items, () => 0.99)).toBe('d');
  });
});

describe('shuffleInPlace', () => {
  it('keeps every element', () => {
    const items = [1, 2, 3, 4, 5, 6];
    shuffleInPlace(items, createSeededRandom(3));
    expect([...items].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('reverses with a source that always returns 0', () => {
    // j is always 0: swaps (3,0), (2,0), (1,0)
    const items = ['a', 'b', 'c', 'd'];
    shuffleInPlace(items, () => 0);
    expect(items).toEqual(['b', 'c', 'd', 'a']);
  });
});
