import { describe, it, expect } from 'vitest';
import type { EngineConfig } from '@transcut/core';
import { resolveLogLevel, resolveSearchSettings } from './options.js';

const engine: EngineConfig = {
  batchSize: 20,
  semanticThreshold: 0.45,
  embeddingModel: 'text-embedding-3-small',
  ffmpegPath: 'ffmpeg',
  ffprobePath: 'ffprobe',
};

describe('resolveLogLevel', () => {
  it('defaults to warn', () => {
    expect(resolveLogLevel(undefined)).toBe('warn');
  });

  it('accepts info and debug', () => {
    expect(resolveLogLevel('info')).toBe('info');
    expect(resolveLogLevel('debug')).toBe('debug');
  });

  it('rejects anything else', () => {
    expect(() => resolveLogLevel('verbose')).toThrow('Invalid log level. Use "warn", "info" or "debug".');
  });
});

describe('resolveSearchSettings', () => {
  it('falls back to engine defaults', () => {
    expect(resolveSearchSettings(['a.mp4'], { query: ['hello'] }, null, engine)).toEqual({
      files: ['a.mp4'],
      queries: ['hello'],
      searchType: 'sentence',
      exactMatch: false,
      threshold: 0.45,
      padding: undefined,
      resync: 0,
      maxClips: undefined,
      randomize: false,
      seed: undefined,
      preferredExt: undefined,
      forceReindex: false,
    });
  });

  it('lets the config file override defaults and flags override the config', () => {
    const settings = resolveSearchSettings(
      ['a.mp4'],
      { query: ['hello'], padding: 0.5 },
      { search: { searchType: 'fragment', padding: 0.2, threshold: 0.6, preferredExt: '.srt' } },
      engine,
    );

    expect(settings.searchType).toBe('fragment');
    expect(settings.padding).toBe(0.5);
    expect(settings.threshold).toBe(0.6);
    expect(settings.preferredExt).toBe('.srt');
  });
});
