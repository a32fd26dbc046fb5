import { readdir, readFile, stat } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import { TRANSCRIPT_EXTENSIONS } from '../config.js';
import { TranscriptErrorCode, createTranscriptError, toError } from '../errors/index.js';
import type { TranscutError } from '../errors/index.js';
import type { Logger } from '../logger.js';
import { escapeRegExp } from '../strings.js';
import { err, ok } from '../types.js';
import type { Result, Segment } from '../types.js';
import { detectTranscriptFormat } from './formats.js';
import type { TranscriptFormatKind } from './formats.js';
import { parseJsonTranscript } from './json-parser.js';
import { parseSphinx } from './sphinx-parser.js';
import { parseSrt } from './srt-parser.js';
import { TranscriptCache } from './transcript-cache.js';
import { parseVtt } from './vtt-parser.js';

export type TranscriptParser = (text: string, file: string) => Segment[];

const PARSERS: Record<Exclude<TranscriptFormatKind, 'unknown'>, TranscriptParser> = {
  json: parseJsonTranscript,
  vtt: parseVtt,
  srt: parseSrt,
  sphinx: parseSphinx,
};

export interface TranscriptStoreOptions {
  cache?: TranscriptCache;
  logger?: Partial<Logger>;
}

export interface TranscriptStore {
  /** Locates the transcript belonging to a media file, or null. */
  findTranscript(mediaPath: string, preferredExt?: string): Promise<string | null>;
  /** Finds, parses and caches a transcript, reporting why it failed. */
  loadTranscript(mediaPath: string, preferredExt?: string): Promise<Result<Segment[], TranscutError>>;
  /** Like `loadTranscript` but logs failures and returns null. */
  parseTranscript(mediaPath: string, preferredExt?: string): Promise<Segment[] | null>;
  clearCache(): void;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

async function listFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();
}

export function createTranscriptStore(options: TranscriptStoreOptions = {}): TranscriptStore {
  const cache = options.cache ?? new TranscriptCache();
  const logger = options.logger ?? {};

  async function findTranscript(mediaPath: string, preferredExt?: string): Promise<string | null> {
    const directory = dirname(mediaPath);
    if (!(await pathExists(directory))) {
      return null;
    }

    const extensions = preferredExt ? [preferredExt, ...TRANSCRIPT_EXTENSIONS] : [...TRANSCRIPT_EXTENSIONS];
    const mediaExt = extname(mediaPath);
    const stem = basename(mediaPath, mediaExt);
    const withoutExt = mediaPath.slice(0, mediaPath.length - mediaExt.length);

    // Same stem: video.mp4 -> video.srt
    for (const ext of extensions) {
      const candidate = `${withoutExt}${ext}`;
      if (await pathExists(candidate)) {
        return candidate;
      }
    }

    let siblings: string[];
    try {
      siblings = await listFiles(directory);
    } catch (error) {
      logger.debug?.('transcript.find.listFailed', { directory, error: toError(error).message });
      return null;
    }

    // Language-tagged names: video.en.srt
    for (const ext of extensions) {
      const hit = siblings.find((name) => name.startsWith(stem) && extname(name) === ext);
      if (hit) {
        return join(directory, hit);
      }
    }

    for (const ext of extensions) {
      const pattern = new RegExp(`${escapeRegExp(stem)}.*?\\.?${escapeRegExp(ext.replace('.', ''))}`);
      const hit = siblings.find((name) => pattern.test(name));
      if (hit) {
        return join(directory, hit);
      }
    }

    return null;
  }

  async function loadTranscript(
    mediaPath: string,
    preferredExt?: string,
  ): Promise<Result<Segment[], TranscutError>> {
    const transcriptPath = await findTranscript(mediaPath, preferredExt);
    if (!transcriptPath) {
      return err(
        createTranscriptError(
          TranscriptErrorCode.TRANSCRIPT_NOT_FOUND,
          `No transcript found for ${basename(mediaPath)}`,
          {
            filePath: mediaPath,
            suggestion: `Place a ${TRANSCRIPT_EXTENSIONS.join(', ')} file next to the media file.`,
          },
        ),
      );
    }

    const format = detectTranscriptFormat(transcriptPath);
    if (format.kind === 'unknown') {
      return err(
        createTranscriptError(
          TranscriptErrorCode.UNKNOWN_TRANSCRIPT_FORMAT,
          `Unsupported transcript format "${format.extension}"`,
          { filePath: transcriptPath },
        ),
      );
    }

    try {
      const { mtimeMs } = await stat(transcriptPath);
      const cached = cache.get(transcriptPath, mtimeMs);
      if (cached) {
        logger.debug?.('transcript.cache.hit', { transcriptPath });
        return ok(cached);
      }

      const text = await readFile(transcriptPath, 'utf8');
      const segments = PARSERS[format.kind](text, mediaPath);
      cache.set(transcriptPath, mtimeMs, segments);
      logger.debug?.('transcript.parsed', {
        transcriptPath,
        format: format.kind,
        segments: segments.length,
      });
      return ok(segments);
    } catch (error) {
      return err(
        createTranscriptError(
          TranscriptErrorCode.TRANSCRIPT_PARSE_FAILED,
          `Failed to parse ${basename(transcriptPath)}: ${toError(error).message}`,
          { filePath: transcriptPath, cause: error },
        ),
      );
    }
  }

  async function parseTranscript(mediaPath: string, preferredExt?: string): Promise<Segment[] | null> {
    const result = await loadTranscript(mediaPath, preferredExt);
    if (!result.ok) {
      logger.warn?.('transcript.load.failed', {
        code: result.error.code,
        file: mediaPath,
        message: result.error.message,
      });
      return null;
    }
    return result.value;
  }

  return {
    findTranscript,
    loadTranscript,
    parseTranscript,
    clearCache: () => cache.clear(),
  };
}
