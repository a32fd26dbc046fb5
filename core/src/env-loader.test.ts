import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { loadEnv, resolveEngineConfig } from './env-loader.js';
import { existsSync, readFileSync } from 'node:fs';
import { config as dotenvConfig } from 'dotenv';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

vi.mock('dotenv', () => ({
  config: vi.fn(),
}));

describe('loadEnv', () => {
  const mockExistsSync = vi.mocked(existsSync);
  const mockReadFileSync = vi.mocked(readFileSync);
  const mockDotenvConfig = vi.mocked(dotenvConfig);

  beforeEach(() => {
    vi.clearAllMocks();
    mockDotenvConfig.mockReturnValue({ parsed: undefined });
    mockReadFileSync.mockReturnValue('{"name":"transcut","workspaces":["core"]}');
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns an empty list when no .env files exist', () => {
    mockExistsSync.mockReturnValue(false);

    const result = loadEnv(import.meta.url);

    expect(result.loaded).toEqual([]);
    expect(mockDotenvConfig).not.toHaveBeenCalled();
  });

  it('loads .env from the workspace root when a package.json declares workspaces', () => {
    mockExistsSync.mockImplementation((path) => {
      return typeof path === 'string' && (path.endsWith('package.json') || path.endsWith('.env'));
    });
    mockDotenvConfig.mockReturnValue({ parsed: { TEST: 'value' } });

    const result = loadEnv(import.meta.url);

    expect(result.loaded.length).toBeGreaterThan(0);
    expect(result.loaded[0]).toMatch(/\.env$/);
    expect(mockDotenvConfig).toHaveBeenCalled();
  });

  it('falls back to the cwd .env without overriding when no workspace root is found', () => {
    mockExistsSync.mockImplementation((path) => {
      return typeof path === 'string' && path.endsWith('.env');
    });
    mockDotenvConfig.mockReturnValue({ parsed: { FALLBACK: 'value' } });

    const result = loadEnv(import.meta.url);

    expect(result.loaded).toHaveLength(1);
    expect(mockDotenvConfig).toHaveBeenCalledWith(expect.objectContaining({ override: false }));
  });

  it('ignores package.json files without a workspaces field', () => {
    mockReadFileSync.mockReturnValue('{"name":"leaf"}');
    mockExistsSync.mockImplementation((path) => {
      return typeof path === 'string' && path.endsWith('package.json');
    });

    const result = loadEnv(import.meta.url);

    expect(result.loaded).toEqual([]);
  });

  it('logs loaded files when verbose', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    mockExistsSync.mockReturnValue(true);
    mockDotenvConfig.mockReturnValue({ parsed: { TEST: 'value' } });

    loadEnv(import.meta.url, { verbose: true });

    expect(consoleSpy).toHaveBeenCalledWith(expect.stringContaining('[env] Loaded:'));
  });

  it('stays quiet when verbose is false', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    mockExistsSync.mockReturnValue(true);
    mockDotenvConfig.mockReturnValue({ parsed: { TEST: 'value' } });

    loadEnv(import.meta.url, { verbose: false });

    expect(consoleSpy).not.toHaveBeenCalled();
  });
});

describe('resolveEngineConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(resolveEngineConfig({})).toEqual({
      batchSize: 20,
      semanticThreshold: 0.45,
      embeddingModel: 'text-embedding-3-small',
      ffmpegPath: 'ffmpeg',
      ffprobePath: 'ffprobe',
      openAiApiKey: undefined,
    });
  });

  it('reads overrides', () => {
    const config = resolveEngineConfig({
      TRANSCUT_BATCH_SIZE: '5',
      TRANSCUT_SEMANTIC_THRESHOLD: '0.6',
      TRANSCUT_EMBEDDING_MODEL: 'text-embedding-3-large',
      TRANSCUT_FFMPEG_PATH: '/opt/ffmpeg/bin/ffmpeg',
      OPENAI_API_KEY: 'test-secret',
    });

    expect(config.batchSize).toBe(5);
    expect(config.semanticThreshold).toBe(0.6);
    expect(config.embeddingModel).toBe('text-embedding-3-large');
    expect(config.ffmpegPath).toBe('/opt/ffmpeg/bin/ffmpeg');
    expect(config.openAiApiKey).toBe('test-secret');
  });

  it('rejects a non-integer batch size', () => {
    expect(() => resolveEngineConfig({ TRANSCUT_BATCH_SIZE: '2.5' })).toThrow(
      'TRANSCUT_BATCH_SIZE must be a positive integer (received "2.5").',
    );
  });

  it('rejects a threshold outside [0, 1]', () => {
    expect(() => resolveEngineConfig({ TRANSCUT_SEMANTIC_THRESHOLD: '1.5' })).toThrow(
      /TRANSCUT_SEMANTIC_THRESHOLD/,
    );
  });
});
