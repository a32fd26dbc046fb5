export * from './errors/index.js';
export { noopLogger, withLogLevel, type Logger, type LogLevel, type LogMeta } from './logger.js';
export * from './types.js';
export * from './config.js';
export { loadEnv, resolveEngineConfig, type EnvLoaderOptions, type EnvLoaderResult, type EngineConfig } from './env-loader.js';
export { createSeededRandom, pickRandom, shuffleInPlace } from './random.js';
export { escapeRegExp, splitWords } from './strings.js';

// Transcripts
export { createTranscriptStore, type TranscriptStore, type TranscriptStoreOptions, type TranscriptParser } from './transcripts/transcript-store.js';
export { TranscriptCache } from './transcripts/transcript-cache.js';
export { detectTranscriptFormat, type TranscriptFormat, type TranscriptFormatKind } from './transcripts/formats.js';
export { parseJsonTranscript, TRANSCRIPT_JSON_SCHEMA } from './transcripts/json-parser.js';
export { parseVtt } from './transcripts/vtt-parser.js';
export { parseSrt } from './transcripts/srt-parser.js';
export { parseSphinx } from './transcripts/sphinx-parser.js';
export { parseTimestamp, parseTimingLine, formatVttTimestamp, type TimingLine } from './transcripts/timestamps.js';
export { synthesizeWordTimestamps, type SynthesizeOptions } from './words.js';

// Search
export {
  createSearchEngine,
  type SearchEngine,
  type SearchEngineOptions,
  type SearchRequest,
  type SearchOutcome,
  type SkippedFile,
} from './search/search-engine.js';
export { compileQuery, compileToken, tokenizeQuery, normalizeWord } from './search/query.js';
export { searchSentences } from './search/sentence.js';
export { searchFragments } from './search/fragment.js';
export { searchMash, type FileWords } from './search/mash.js';
export { cosineSimilarity, rankBySimilarity, type EmbeddedSegment } from './search/semantic.js';
export {
  EmbeddingIndex,
  encodeEmbeddings,
  decodeEmbeddings,
  getEmbeddingsPath,
  type EmbeddingProvider,
  type EmbeddingMatrix,
  type EmbeddingIndexOptions,
  type SegmentEmbeddingOptions,
} from './search/embedding-index.js';
export { getNgrams, countNgrams, loadDefaultIgnoredWords, type Ngram, type NgramCount, type NgramOptions } from './search/ngrams.js';

// Composition
export {
  buildComposition,
  padAndSync,
  removeOverlaps,
  resolveDefaultPadding,
  type BuildCompositionOptions,
} from './composition/composition-builder.js';
export { getCompositionDuration, summarizeComposition, type CompositionSummary } from './composition/stats.js';

// Export
export * from './export/index.js';
