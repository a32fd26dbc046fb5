import {
  buildComposition,
  createSearchEngine,
  createSeededRandom,
  isSearchType,
  type Composition,
  type EmbeddingProvider,
  type Logger,
  type SkippedFile,
  type TranscriptStore,
} from '@transcut/core';

export interface SearchCommandOptions {
  files: string[];
  queries: string[];
  searchType: string;
  exactMatch?: boolean;
  threshold?: number;
  padding?: number;
  resync?: number;
  maxClips?: number;
  randomize?: boolean;
  /** Seeds shuffling and mash picks for repeatable output. */
  seed?: number;
  preferredExt?: string;
  forceReindex?: boolean;
  embeddings?: EmbeddingProvider;
  store?: TranscriptStore;
  logger?: Partial<Logger>;
}

export interface SearchCommandResult {
  composition: Composition;
  skipped: SkippedFile[];
}

/** Searches the files and turns the hits into a composition. */
export async function runSearch(options: SearchCommandOptions): Promise<SearchCommandResult> {
  const random = options.seed !== undefined ? createSeededRandom(options.seed) : Math.random;
  const engine = createSearchEngine({
    store: options.store,
    embeddings: options.embeddings,
    random,
    logger: options.logger,
  });

  const searchType = options.searchType.toLowerCase();
  const { matches, skipped } = await engine.search({
    files: options.files,
    queries: options.queries,
    searchType,
    exactMatch: options.exactMatch,
    threshold: options.threshold,
    preferredExt: options.preferredExt,
    forceReindex: options.forceReindex,
  });

  const composition = buildComposition(matches, {
    padding: options.padding,
    resync: options.resync,
    randomize: options.randomize,
    maxClips: options.maxClips,
    searchType: isSearchType(searchType) ? searchType : undefined,
    random,
    logger: options.logger,
  });
  return { composition, skipped };
}
