/**
 * Error creation helpers.
 *
 * Provides factory functions for creating structured errors with
 * consistent formatting across transcript, search and export layers.
 */

import type { ErrorLocation, TranscutError } from './types.js';
import { getErrorCategory, getErrorSeverity } from './codes.js';

export interface CreateErrorOptions {
  /** Error code (e.g., 'T001', 'S002') */
  code: string;
  message: string;
  location?: ErrorLocation;
  suggestion?: string;
  /** Original error that caused this error */
  cause?: unknown;
}

/**
 * Creates a TranscutError. Category and severity are inferred from the code.
 */
export function createTranscutError(options: CreateErrorOptions): TranscutError {
  const { code, message, location, suggestion, cause } = options;

  return Object.assign(new Error(message, { cause }), {
    name: 'TranscutError',
    code,
    category: getErrorCategory(code),
    severity: getErrorSeverity(code),
    location,
    suggestion,
  });
}

interface ScopedErrorOptions {
  filePath?: string;
  context?: string;
  suggestion?: string;
  cause?: unknown;
}

function createScopedError(code: string, message: string, options: ScopedErrorOptions): TranscutError {
  return createTranscutError({
    code,
    message,
    location:
      options.filePath !== undefined || options.context !== undefined
        ? { filePath: options.filePath, context: options.context }
        : undefined,
    suggestion: options.suggestion,
    cause: options.cause,
  });
}

/**
 * Creates a transcript error (T-code).
 */
export function createTranscriptError(
  code: string,
  message: string,
  options: ScopedErrorOptions = {},
): TranscutError {
  return createScopedError(code, message, options);
}

/**
 * Creates a search error (S-code).
 */
export function createSearchError(
  code: string,
  message: string,
  options: ScopedErrorOptions = {},
): TranscutError {
  return createScopedError(code, message, options);
}

/**
 * Creates an export error (E-code).
 */
export function createExportError(
  code: string,
  message: string,
  options: ScopedErrorOptions = {},
): TranscutError {
  return createScopedError(code, message, options);
}

/**
 * Normalises anything thrown into an Error instance.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// =============================================================================
// Error Formatting
// =============================================================================

export function formatError(error: TranscutError): string {
  const parts: string[] = [];

  parts.push(`[${error.code}] ${error.message}`);

  if (error.location) {
    const loc = error.location;
    if (loc.filePath) {
      parts.push(`  File: ${loc.filePath}`);
    }
    if (loc.context) {
      parts.push(`  Context: ${loc.context}`);
    }
  }

  if (error.suggestion) {
    parts.push(`  Suggestion: ${error.suggestion}`);
  }

  return parts.join('\n');
}
