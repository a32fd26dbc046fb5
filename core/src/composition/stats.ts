import type { Composition } from '../types.js';

export interface CompositionSummary {
  clipCount: number;
  /** Total seconds of the rendered composition. */
  compositionDuration: number;
  /** Total seconds of the distinct source files, when known. */
  originalDuration: number;
  timeSaved: number;
  efficiencyPercent: number;
}

export function getCompositionDuration(composition: Composition): number {
  return composition.reduce((total, clip) => total + (clip.end - clip.start), 0);
}

/**
 * Summarises a composition against the full length of its sources. Files
 * missing from `originalDurations` count as zero seconds.
 */
export function summarizeComposition(
  composition: Composition,
  originalDurations: ReadonlyMap<string, number> = new Map(),
): CompositionSummary {
  const compositionDuration = getCompositionDuration(composition);
  const files = new Set(composition.map((clip) => clip.file));
  let originalDuration = 0;
  for (const file of files) {
    originalDuration += originalDurations.get(file) ?? 0;
  }
  const timeSaved = Math.max(0, originalDuration - compositionDuration);
  return {
    clipCount: composition.length,
    compositionDuration,
    originalDuration,
    timeSaved,
    efficiencyPercent: originalDuration > 0 ? (timeSaved * 100) / originalDuration : 0,
  };
}
