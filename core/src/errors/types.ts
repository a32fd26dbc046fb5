/**
 * Shared error types for Transcut:
 * - T (Transcript): discovery, parsing and embedding cache errors
 * - S (Search): invalid search type, missing capabilities
 * - E (Export): planning, batching and rendering errors
 * - W (Warnings): soft warnings across all layers
 */

export type ErrorCategory = 'transcript' | 'search' | 'export';

export type ErrorSeverity = 'error' | 'warning';

export interface ErrorLocation {
  /** Media or transcript file the error refers to */
  filePath?: string;
  /** Element context (e.g., "batch 3 of 7", "query 'hello world'") */
  context?: string;
}

export interface TranscutError extends Error {
  /** Unique error code (e.g., 'T001', 'S002', 'E003') */
  code: string;
  category: ErrorCategory;
  severity: ErrorSeverity;
  location?: ErrorLocation;
  /** Suggested fix (optional) */
  suggestion?: string;
}

export function isTranscutError(error: unknown): error is TranscutError {
  return (
    error instanceof Error &&
    'code' in error &&
    'category' in error &&
    'severity' in error &&
    typeof error.code === 'string' &&
    typeof error.category === 'string' &&
    typeof error.severity === 'string'
  );
}

/**
 * Checks whether an error is a TranscutError carrying the given code.
 */
export function hasErrorCode(error: unknown, code: string): error is TranscutError {
  return isTranscutError(error) && error.code === code;
}
