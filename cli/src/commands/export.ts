import {
  exportComposition,
  summarizeComposition,
  type CompositionSummary,
  type ExportCompositionResult,
  type ExportProgressEvent,
  type MediaRenderer,
  type SkippedFile,
} from '@transcut/core';
import { runSearch, type SearchCommandOptions } from './search.js';

export interface ExportCommandOptions extends SearchCommandOptions {
  outputPath: string;
  exportClips?: boolean;
  writeVtt?: boolean;
  batchSize?: number;
  renderer?: MediaRenderer;
  /** Source durations for the summary; files it leaves out count as zero. */
  probeDurations?: (files: string[]) => Promise<ReadonlyMap<string, number>>;
  onProgress?: (event: ExportProgressEvent) => void;
  signal?: AbortSignal;
}

export interface ExportCommandResult {
  /** Null when the search found nothing to export. */
  export: ExportCompositionResult | null;
  summary: CompositionSummary;
  skipped: SkippedFile[];
}

/** Searches, composes and writes the composition in the mode the output asks for. */
export async function runExportCommand(options: ExportCommandOptions): Promise<ExportCommandResult> {
  const { composition, skipped } = await runSearch(options);
  const logger = options.logger ?? {};

  if (composition.length === 0) {
    logger.warn?.('export.skipped', { reason: 'no matches', files: options.files.length });
    return { export: null, summary: summarizeComposition(composition), skipped };
  }

  const result = await exportComposition({
    composition,
    outputPath: options.outputPath,
    renderer: options.renderer,
    exportClips: options.exportClips,
    writeVtt: options.writeVtt,
    batchSize: options.batchSize,
    onProgress: options.onProgress,
    signal: options.signal,
    logger: options.logger,
  });

  const durations = options.probeDurations
    ? await options.probeDurations([...new Set(composition.map((clip) => clip.file))])
    : new Map<string, number>();
  return { export: result, summary: summarizeComposition(composition, durations), skipped };
}
