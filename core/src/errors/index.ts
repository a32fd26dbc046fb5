/**
 * Transcut Error System
 *
 * - T (Transcript): discovery and parsing errors
 * - S (Search): search strategy errors
 * - E (Export): planning, batching and rendering errors
 * - W (Warnings): soft warnings across all layers
 */

export type {
  ErrorCategory,
  ErrorLocation,
  ErrorSeverity,
  TranscutError,
} from './types.js';
export { isTranscutError, hasErrorCode } from './types.js';

export {
  TranscriptErrorCode,
  SearchErrorCode,
  ExportErrorCode,
  WarningCode,
  ERROR_CODE_CATEGORIES,
  getErrorCategory,
  getErrorSeverity,
} from './codes.js';
export type {
  TranscriptErrorCodeValue,
  SearchErrorCodeValue,
  ExportErrorCodeValue,
  WarningCodeValue,
  ErrorCode,
} from './codes.js';

export type { CreateErrorOptions } from './helpers.js';
export {
  createTranscutError,
  createTranscriptError,
  createSearchError,
  createExportError,
  toError,
  formatError,
} from './helpers.js';
