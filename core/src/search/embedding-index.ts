import { readFile, writeFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { EMBEDDINGS_SUFFIX } from '../config.js';
import {
  SearchErrorCode,
  TranscriptErrorCode,
  createSearchError,
  createTranscriptError,
} from '../errors/index.js';
import type { Logger } from '../logger.js';
import type { Segment } from '../types.js';

/** Turns texts into fixed-length vectors, one per input, in input order. */
export interface EmbeddingProvider {
  readonly name: string;
  embed(texts: string[]): Promise<number[][]>;
}

export interface EmbeddingMatrix {
  rows: number;
  dims: number;
  vectors: number[][];
}

const HEADER_BYTES = 8;
const FLOAT_BYTES = 4;

export function getEmbeddingsPath(mediaPath: string): string {
  const ext = extname(mediaPath);
  return `${mediaPath.slice(0, mediaPath.length - ext.length)}${EMBEDDINGS_SUFFIX}`;
}

/**
 * Layout: `rows:uint32LE, dims:uint32LE`, then rows*dims float32LE values.
 */
export function encodeEmbeddings(vectors: readonly number[][]): Buffer {
  const rows = vectors.length;
  const dims = rows > 0 ? vectors[0].length : 0;
  const buffer = Buffer.alloc(HEADER_BYTES + rows * dims * FLOAT_BYTES);
  buffer.writeUInt32LE(rows, 0);
  buffer.writeUInt32LE(dims, 4);
  let offset = HEADER_BYTES;
  for (const vector of vectors) {
    if (vector.length !== dims) {
      throw createSearchError(
        SearchErrorCode.EMBEDDING_DIMENSION_MISMATCH,
        `Embedding rows must share one dimension (expected ${dims}, got ${vector.length})`,
      );
    }
    for (const value of vector) {
      buffer.writeFloatLE(value, offset);
      offset += FLOAT_BYTES;
    }
  }
  return buffer;
}

export function decodeEmbeddings(buffer: Buffer, filePath?: string): EmbeddingMatrix {
  if (buffer.length < HEADER_BYTES) {
    throw createTranscriptError(
      TranscriptErrorCode.EMBEDDING_CACHE_CORRUPT,
      'Embedding cache is shorter than its header',
      { filePath },
    );
  }
  const rows = buffer.readUInt32LE(0);
  const dims = buffer.readUInt32LE(4);
  const expected = HEADER_BYTES + rows * dims * FLOAT_BYTES;
  if (buffer.length !== expected) {
    throw createTranscriptError(
      TranscriptErrorCode.EMBEDDING_CACHE_CORRUPT,
      `Embedding cache size ${buffer.length} does not match header (${rows}x${dims})`,
      { filePath },
    );
  }
  const vectors: number[][] = [];
  let offset = HEADER_BYTES;
  for (let row = 0; row < rows; row += 1) {
    const vector: number[] = new Array<number>(dims);
    for (let col = 0; col < dims; col += 1) {
      vector[col] = buffer.readFloatLE(offset);
      offset += FLOAT_BYTES;
    }
    vectors.push(vector);
  }
  return { rows, dims, vectors };
}

export interface EmbeddingIndexOptions {
  logger?: Partial<Logger>;
}

export interface SegmentEmbeddingOptions {
  /** Ignore any cached file and re-encode. */
  force?: boolean;
  /** Treat a cache of a different width as stale. */
  dimensions?: number;
}

/**
 * Segment embeddings persisted beside each media file. A cache is reused
 * unless forced, unreadable, or its shape no longer fits the transcript.
 */
export class EmbeddingIndex {
  private readonly logger: Partial<Logger>;

  constructor(
    private readonly provider: EmbeddingProvider,
    options: EmbeddingIndexOptions = {},
  ) {
    this.logger = options.logger ?? {};
  }

  async getSegmentEmbeddings(
    mediaPath: string,
    segments: readonly Segment[],
    options: SegmentEmbeddingOptions = {},
  ): Promise<number[][]> {
    const cachePath = getEmbeddingsPath(mediaPath);

    if (!options.force) {
      const cached = await this.readCache(cachePath);
      if (
        cached &&
        cached.rows === segments.length &&
        (options.dimensions === undefined || cached.rows === 0 || cached.dims === options.dimensions)
      ) {
        this.logger.debug?.('embeddings.cache.hit', { cachePath, rows: cached.rows });
        return cached.vectors;
      }
      if (cached) {
        this.logger.info?.('embeddings.cache.stale', {
          cachePath,
          cachedRows: cached.rows,
          segments: segments.length,
        });
      }
    }

    return this.rebuild(mediaPath, segments);
  }

  /** Encodes every segment and overwrites the cache file. */
  async rebuild(mediaPath: string, segments: readonly Segment[]): Promise<number[][]> {
    const cachePath = getEmbeddingsPath(mediaPath);
    this.logger.info?.('embeddings.generate', {
      file: mediaPath,
      segments: segments.length,
      provider: this.provider.name,
    });
    const vectors = segments.length === 0 ? [] : await this.provider.embed(segments.map((s) => s.content));
    if (vectors.length !== segments.length) {
      throw createSearchError(
        SearchErrorCode.EMBEDDING_DIMENSION_MISMATCH,
        `Embedding provider returned ${vectors.length} vectors for ${segments.length} segments`,
        { filePath: mediaPath },
      );
    }
    await writeFile(cachePath, encodeEmbeddings(vectors));
    return vectors;
  }

  private async readCache(cachePath: string): Promise<EmbeddingMatrix | null> {
    let buffer: Buffer;
    try {
      buffer = await readFile(cachePath);
    } catch {
      return null;
    }
    try {
      return decodeEmbeddings(buffer, cachePath);
    } catch (error) {
      this.logger.warn?.('embeddings.cache.corrupt', {
        code: TranscriptErrorCode.EMBEDDING_CACHE_CORRUPT,
        cachePath,
        message: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
