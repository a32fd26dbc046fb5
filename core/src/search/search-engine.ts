import { DEFAULT_SEMANTIC_THRESHOLD } from '../config.js';
import { SearchErrorCode, WarningCode, createSearchError } from '../errors/index.js';
import type { TranscutError } from '../errors/index.js';
import type { Logger } from '../logger.js';
import { createTranscriptStore } from '../transcripts/transcript-store.js';
import type { TranscriptStore } from '../transcripts/transcript-store.js';
import { isSearchType } from '../types.js';
import type { Match, RandomSource, SearchType, Segment } from '../types.js';
import { synthesizeWordTimestamps } from '../words.js';
import { EmbeddingIndex } from './embedding-index.js';
import type { EmbeddingProvider } from './embedding-index.js';
import { searchFragments } from './fragment.js';
import { searchMash } from './mash.js';
import type { FileWords } from './mash.js';
import { compileQuery } from './query.js';
import { rankBySimilarity } from './semantic.js';
import type { EmbeddedSegment } from './semantic.js';
import { searchSentences } from './sentence.js';

export interface SearchRequest {
  files: string[];
  queries: string[];
  /** One of `SEARCH_TYPES`; validated at run time. */
  searchType: string;
  exactMatch?: boolean;
  /** Minimum cosine similarity for semantic hits. */
  threshold?: number;
  preferredExt?: string;
  /** Re-encode segment embeddings even when a cache exists. */
  forceReindex?: boolean;
}

export interface SkippedFile {
  file: string;
  error: TranscutError;
}

export interface SearchOutcome {
  matches: Match[];
  /** Files without a usable transcript. An empty `matches` with no skips means "no results". */
  skipped: SkippedFile[];
}

export interface SearchEngineOptions {
  store?: TranscriptStore;
  /** Required for semantic search. */
  embeddings?: EmbeddingProvider;
  embeddingIndex?: EmbeddingIndex;
  random?: RandomSource;
  logger?: Partial<Logger>;
}

export interface SearchEngine {
  search(request: SearchRequest): Promise<SearchOutcome>;
  /** Builds (or refreshes) the embedding cache of each file. */
  index(files: string[], options?: { force?: boolean; preferredExt?: string }): Promise<SearchOutcome['skipped']>;
}

interface LoadedFile {
  file: string;
  segments: Segment[];
}

export function createSearchEngine(options: SearchEngineOptions = {}): SearchEngine {
  const logger = options.logger ?? {};
  const store = options.store ?? createTranscriptStore({ logger });
  const random = options.random ?? Math.random;
  const embeddingIndex =
    options.embeddingIndex ?? (options.embeddings ? new EmbeddingIndex(options.embeddings, { logger }) : undefined);

  async function loadFiles(files: string[], preferredExt?: string): Promise<{ loaded: LoadedFile[]; skipped: SkippedFile[] }> {
    const loaded: LoadedFile[] = [];
    const skipped: SkippedFile[] = [];
    for (const file of files) {
      const result = await store.loadTranscript(file, preferredExt);
      if (result.ok) {
        loaded.push({ file, segments: result.value });
        continue;
      }
      logger.warn?.('search.file.skipped', {
        code: WarningCode.FILE_SKIPPED,
        cause: result.error.code,
        file,
        message: result.error.message,
      });
      skipped.push({ file, error: result.error });
    }
    return { loaded, skipped };
  }

  function requireEmbeddings(): { provider: EmbeddingProvider; index: EmbeddingIndex } {
    if (!options.embeddings || !embeddingIndex) {
      throw createSearchError(
        SearchErrorCode.CAPABILITY_UNAVAILABLE,
        'Semantic search requires an embedding provider',
        { suggestion: 'Configure an embedding provider (e.g. set OPENAI_API_KEY).' },
      );
    }
    return { provider: options.embeddings, index: embeddingIndex };
  }

  async function runSemantic(
    loaded: LoadedFile[],
    queries: string[],
    threshold: number,
    forceReindex: boolean,
  ): Promise<Match[]> {
    const { provider, index } = requireEmbeddings();
    const queryVectors = await provider.embed(queries);
    const dimensions = queryVectors.length > 0 ? queryVectors[0].length : undefined;

    const candidates: EmbeddedSegment[] = [];
    for (const { file, segments } of loaded) {
      const vectors = await index.getSegmentEmbeddings(file, segments, { force: forceReindex, dimensions });
      vectors.forEach((vector, i) => {
        if (dimensions !== undefined && vector.length !== dimensions) {
          throw createSearchError(
            SearchErrorCode.EMBEDDING_DIMENSION_MISMATCH,
            `Segment embeddings have ${vector.length} dimensions, queries have ${dimensions}`,
            { filePath: file },
          );
        }
        candidates.push({ file, segment: segments[i], vector });
      });
    }

    return rankBySimilarity(queryVectors, candidates, threshold);
  }

  async function search(request: SearchRequest): Promise<SearchOutcome> {
    const searchType = request.searchType.toLowerCase();
    if (!isSearchType(searchType)) {
      throw createSearchError(SearchErrorCode.INVALID_SEARCH_TYPE, `Unsupported search type: ${request.searchType}`, {
        suggestion: 'Use one of: sentence, fragment, mash, semantic.',
      });
    }

    const queries = request.queries.map((query) => query.trim()).filter((query) => query.length > 0);
    if (queries.length === 0) {
      throw createSearchError(SearchErrorCode.INVALID_QUERY, 'At least one non-empty query is required');
    }

    if (searchType === 'semantic') {
      requireEmbeddings();
    }

    const exactMatch = request.exactMatch ?? false;
    const { loaded, skipped } = await loadFiles(request.files, request.preferredExt);
    const matches = await runStrategy(searchType, loaded, queries, {
      exactMatch,
      threshold: request.threshold ?? DEFAULT_SEMANTIC_THRESHOLD,
      forceReindex: request.forceReindex ?? false,
    });

    logger.info?.('search.complete', {
      searchType,
      files: request.files.length,
      skipped: skipped.length,
      matches: matches.length,
    });
    return { matches, skipped };
  }

  async function runStrategy(
    searchType: SearchType,
    loaded: LoadedFile[],
    queries: string[],
    settings: { exactMatch: boolean; threshold: number; forceReindex: boolean },
  ): Promise<Match[]> {
    switch (searchType) {
      case 'sentence': {
        const patterns = queries.map((query) => compileQuery(query, settings.exactMatch, logger));
        return loaded.flatMap(({ file, segments }) => searchSentences(segments, patterns, file));
      }
      case 'fragment':
        return loaded.flatMap(({ file, segments }) =>
          searchFragments(synthesizeWordTimestamps(segments, { file, logger }), queries, file, settings.exactMatch, logger),
        );
      case 'mash': {
        const sources: FileWords[] = loaded.map(({ file, segments }) => ({
          file,
          words: synthesizeWordTimestamps(segments, { file, logger }),
        }));
        return searchMash(sources, queries, random, logger);
      }
      case 'semantic':
        return runSemantic(loaded, queries, settings.threshold, settings.forceReindex);
    }
  }

  async function index(
    files: string[],
    indexOptions: { force?: boolean; preferredExt?: string } = {},
  ): Promise<SkippedFile[]> {
    const { index: embeddingCache } = requireEmbeddings();
    const { loaded, skipped } = await loadFiles(files, indexOptions.preferredExt);
    for (const { file, segments } of loaded) {
      await embeddingCache.getSegmentEmbeddings(file, segments, { force: indexOptions.force });
    }
    return skipped;
  }

  return { search, index };
}
