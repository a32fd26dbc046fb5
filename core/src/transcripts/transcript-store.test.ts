import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile, utimes } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createTranscriptStore } from './transcript-store.js';
import { TranscriptCache } from './transcript-cache.js';

const SRT = '1\n00:00:01,000 --> 00:00:02,000\nfrom the srt\n';
const JSON_TRANSCRIPT = JSON.stringify([{ content: 'from the json', start: 0, end: 1 }]);

describe('createTranscriptStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'transcut-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('findTranscript', () => {
    it('prefers .json over other same-stem transcripts', async () => {
      await writeFile(join(dir, 'talk.srt'), SRT);
      await writeFile(join(dir, 'talk.json'), JSON_TRANSCRIPT);
      const store = createTranscriptStore();

      expect(await store.findTranscript(join(dir, 'talk.mp4'))).toBe(join(dir, 'talk.json'));
    });

    it('tries the preferred extension first', async () => {
      await writeFile(join(dir, 'talk.srt'), SRT);
      await writeFile(join(dir, 'talk.json'), JSON_TRANSCRIPT);
      const store = createTranscriptStore();

      expect(await store.findTranscript(join(dir, 'talk.mp4'), '.srt')).toBe(join(dir, 'talk.srt'));
    });

    it('finds language-tagged transcripts', async () => {
      await writeFile(join(dir, 'movie.en.srt'), SRT);
      const store = createTranscriptStore();

      expect(await store.findTranscript(join(dir, 'movie.mp4'))).toBe(join(dir, 'movie.en.srt'));
    });

    it('falls back to a loose name match', async () => {
      await writeFile(join(dir, 'clip_subs.vtt.bak'), 'WEBVTT\n');
      const store = createTranscriptStore();

      expect(await store.findTranscript(join(dir, 'clip.mp4'))).toBe(join(dir, 'clip_subs.vtt.bak'));
    });

    it('returns null when nothing matches', async () => {
      await writeFile(join(dir, 'other.srt'), SRT);
      const store = createTranscriptStore();

      expect(await store.findTranscript(join(dir, 'talk.mp4'))).toBeNull();
    });

    it('returns null when the directory does not exist', async () => {
      const store = createTranscriptStore();

      expect(await store.findTranscript(join(dir, 'missing', 'talk.mp4'))).toBeNull();
    });
  });

  describe('loadTranscript', () => {
    it('reports T001 when no transcript exists', async () => {
      const store = createTranscriptStore();
      const result = await store.loadTranscript(join(dir, 'talk.mp4'));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('T001');
        expect(result.error.location?.filePath).toBe(join(dir, 'talk.mp4'));
      }
    });

    it('reports T003 for an unsupported transcript extension', async () => {
      await writeFile(join(dir, 'talk.txt'), 'plain text');
      const store = createTranscriptStore();
      const result = await store.loadTranscript(join(dir, 'talk.mp4'), '.txt');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('T003');
      }
    });

    it('reports T002 for a malformed transcript', async () => {
      await writeFile(join(dir, 'talk.json'), '[{"content": 1}]');
      const store = createTranscriptStore();
      const result = await store.loadTranscript(join(dir, 'talk.mp4'));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('T002');
        expect(result.error.location?.filePath).toBe(join(dir, 'talk.json'));
      }
    });

    it('tags segments with the media path', async () => {
      await writeFile(join(dir, 'talk.srt'), SRT);
      const store = createTranscriptStore();
      const result = await store.loadTranscript(join(dir, 'talk.mp4'));

      expect(result).toEqual({
        ok: true,
        value: [{ file: join(dir, 'talk.mp4'), start: 1, end: 2, content: 'from the srt' }],
      });
    });
  });

  describe('parseTranscript', () => {
    it('logs failures and returns null', async () => {
      const warn = vi.fn();
      const store = createTranscriptStore({ logger: { warn } });

      expect(await store.parseTranscript(join(dir, 'talk.mp4'))).toBeNull();
      expect(warn).toHaveBeenCalledWith(
        'transcript.load.failed',
        expect.objectContaining({ code: 'T001', file: join(dir, 'talk.mp4') }),
      );
    });

    it('serves an unmodified transcript from the cache', async () => {
      await writeFile(join(dir, 'talk.srt'), SRT);
      const cache = new TranscriptCache();
      const store = createTranscriptStore({ cache });

      const first = await store.parseTranscript(join(dir, 'talk.mp4'));
      const second = await store.parseTranscript(join(dir, 'talk.mp4'));

      expect(first).not.toBeNull();
      expect(second).toBe(first);
      expect(cache.size).toBe(1);
    });

    it('re-parses after the file changes', async () => {
      const transcriptPath = join(dir, 'talk.srt');
      await writeFile(transcriptPath, SRT);
      const store = createTranscriptStore();

      const first = await store.parseTranscript(join(dir, 'talk.mp4'));
      await writeFile(transcriptPath, '1\n00:00:05,000 --> 00:00:06,000\nchanged\n');
      const later = new Date(Date.now() + 10_000);
      await utimes(transcriptPath, later, later);
      const second = await store.parseTranscript(join(dir, 'talk.mp4'));

      expect(second).not.toBe(first);
      expect(second?.[0].content).toBe('changed');
    });

    it('re-parses after clearCache', async () => {
      await writeFile(join(dir, 'talk.srt'), SRT);
      const store = createTranscriptStore();

      const first = await store.parseTranscript(join(dir, 'talk.mp4'));
      store.clearCache();
      const second = await store.parseTranscript(join(dir, 'talk.mp4'));

      expect(second).not.toBe(first);
      expect(second).toEqual(first);
    });
  });
});
