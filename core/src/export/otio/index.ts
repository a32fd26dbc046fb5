/**
 * OpenTimelineIO (OTIO) export of compositions, for DaVinci Resolve,
 * Premiere Pro and other NLEs.
 *
 * @example
 * ```typescript
 * const result = exportCompositionToOTIO({ composition, options: { fps: 25, name: 'Supercut' } });
 * await writeFile('supercut.otio', result.otioJson);
 * ```
 */

import type { Composition } from '../../types.js';
import type { OTIOExportOptions, OTIOExportResult } from './types.js';
import { convertCompositionToOTIO } from './converter.js';

export type {
  OTIOTimeline,
  OTIOStack,
  OTIOTrack,
  OTIOTrackKind,
  OTIOClip,
  OTIOExternalReference,
  OTIORationalTime,
  OTIOTimeRange,
  OTIOExportResult,
  OTIOExportOptions,
  OTIOExportStats,
} from './types.js';

export { createRationalTime, createTimeRange, createZeroTime, rationalTimeToSeconds } from './time-utils.js';

export interface ExportCompositionToOTIOArgs {
  composition: Composition;
  options: OTIOExportOptions;
}

export function exportCompositionToOTIO(args: ExportCompositionToOTIOArgs): OTIOExportResult {
  return convertCompositionToOTIO(args.composition, args.options);
}
