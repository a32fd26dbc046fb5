/**
 * Engine-wide constants. Values that users commonly tune can be overridden
 * through environment variables, see `resolveEngineConfig` in env-loader.ts.
 */

/** Transcript extensions in lookup priority order. */
export const TRANSCRIPT_EXTENSIONS = ['.json', '.vtt', '.srt', '.transcript'] as const;

export const VIDEO_EXTENSIONS = ['.mp4', '.mkv', '.avi', '.mov', '.webm', '.flv'] as const;
export const AUDIO_EXTENSIONS = ['.mp3', '.wav', '.aac', '.flac', '.ogg', '.m4a'] as const;

/** Output containers that can only hold audio. */
export const AUDIO_OUTPUT_EXTENSIONS = AUDIO_EXTENSIONS;
/** Output containers that require a video stream. */
export const VIDEO_OUTPUT_EXTENSIONS = ['.mp4', '.mkv', '.mov', '.avi', '.webm'] as const;

export const DEFAULT_OUTPUT_FILE = 'supercut.mp4';

/** Clips rendered per intermediate file when a supercut is large. */
export const BATCH_SIZE = 20;

/** Padding in seconds applied to fragment matches when none is requested. */
export const DEFAULT_PADDING = 0.3;

/** Micro-padding for single-word mash clips (50ms). */
export const MASH_PADDING = 0.05;

export const DEFAULT_SEMANTIC_THRESHOLD = 0.45;

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

/** Suffix replacing the media extension for the on-disk embedding cache. */
export const EMBEDDINGS_SUFFIX = '.embeddings.bin';

/** Maximum number of n-grams reported by `countNgrams`. */
export const MAX_REPORTED_NGRAMS = 100;
