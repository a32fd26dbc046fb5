/**
 * Unified error code constants for Transcut.
 *
 * Code format: {Category}{Number}
 * - T: Transcript errors (T001-T099)
 * - S: Search errors (S001-S099)
 * - E: Export errors (E001-E099)
 * - W: Warnings (W001-W099)
 */

// =============================================================================
// Transcript Error Codes (T001-T099)
// =============================================================================

export const TranscriptErrorCode = {
  // T001-T009: Discovery and parsing
  TRANSCRIPT_NOT_FOUND: 'T001',
  TRANSCRIPT_PARSE_FAILED: 'T002',
  UNKNOWN_TRANSCRIPT_FORMAT: 'T003',

  // T010-T019: Embedding index
  EMBEDDING_CACHE_CORRUPT: 'T010',
} as const;

export type TranscriptErrorCodeValue = (typeof TranscriptErrorCode)[keyof typeof TranscriptErrorCode];

// =============================================================================
// Search Error Codes (S001-S099)
// =============================================================================

export const SearchErrorCode = {
  INVALID_SEARCH_TYPE: 'S001',
  CAPABILITY_UNAVAILABLE: 'S002',
  MASH_TOKEN_MISSING: 'S003',
  INVALID_QUERY: 'S004',
  EMBEDDING_DIMENSION_MISMATCH: 'S005',
} as const;

export type SearchErrorCodeValue = (typeof SearchErrorCode)[keyof typeof SearchErrorCode];

// =============================================================================
// Export Error Codes (E001-E099)
// =============================================================================

export const ExportErrorCode = {
  // E001-E009: Planning and batching
  INCOMPATIBLE_OUTPUT_FORMAT: 'E001',
  BATCH_FAILED: 'E002',
  EXPORT_TOTAL_FAILURE: 'E003',

  // E010-E019: Renderer
  RENDER_FAILED: 'E010',
  RENDERER_NOT_FOUND: 'E011',
  MISSING_INPUT: 'E012',
  RENDER_CANCELLED: 'E013',
} as const;

export type ExportErrorCodeValue = (typeof ExportErrorCode)[keyof typeof ExportErrorCode];

// =============================================================================
// Warning Codes (W001-W099)
// =============================================================================

export const WarningCode = {
  SYNTHESIZED_WORD_TIMESTAMPS: 'W001',
  FILE_SKIPPED: 'W002',
} as const;

export type WarningCodeValue = (typeof WarningCode)[keyof typeof WarningCode];

// =============================================================================
// Combined Types
// =============================================================================

export type ErrorCode =
  | TranscriptErrorCodeValue
  | SearchErrorCodeValue
  | ExportErrorCodeValue
  | WarningCodeValue;

/**
 * Maps error code prefixes to their categories.
 */
export const ERROR_CODE_CATEGORIES = {
  T: 'transcript',
  S: 'search',
  E: 'export',
  W: 'transcript',
} as const;

export type ErrorCodePrefix = keyof typeof ERROR_CODE_CATEGORIES;

function isErrorCodePrefix(value: string): value is ErrorCodePrefix {
  return value in ERROR_CODE_CATEGORIES;
}

/**
 * Gets the category for an error code. Unknown prefixes fall back to 'search'.
 */
export function getErrorCategory(code: string): 'transcript' | 'search' | 'export' {
  const prefix = code.charAt(0);
  return isErrorCodePrefix(prefix) ? ERROR_CODE_CATEGORIES[prefix] : 'search';
}

export function getErrorSeverity(code: string): 'error' | 'warning' {
  return code.startsWith('W') ? 'warning' : 'error';
}
