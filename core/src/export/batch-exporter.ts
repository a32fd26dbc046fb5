import { readdir, rm } from 'node:fs/promises';
import { dirname, extname, join, resolve } from 'node:path';
import { BATCH_SIZE } from '../config.js';
import { ExportErrorCode, createExportError, toError } from '../errors/index.js';
import type { TranscutError } from '../errors/index.js';
import type { Logger } from '../logger.js';
import type { Composition, ExportStrategy, ItemSummary, Match } from '../types.js';
import { chunkComposition, getStrategyExtension, planOutputStrategy, resolveOutputPath } from './planner.js';
import type { MediaRenderer } from './renderer.js';

export interface ExportProgressEvent {
  /** Overall fraction in [0, 1]. */
  fraction: number;
  stage: 'render' | 'concatenate' | 'done';
  batchIndex?: number;
  totalBatches?: number;
}

export interface ExportSupercutOptions {
  composition: Composition;
  outputPath: string;
  renderer: MediaRenderer;
  batchSize?: number;
  onProgress?: (event: ExportProgressEvent) => void;
  signal?: AbortSignal;
  logger?: Partial<Logger>;
}

export interface BatchFailure {
  batchIndex: number;
  error: Error;
}

export interface BatchExportReport {
  /** Final path; may differ from the requested one (`.mp4` → `.mp3`). */
  outputPath: string;
  strategy: ExportStrategy;
  totalBatches: number;
  succeeded: number;
  failed: BatchFailure[];
  successRatio: number;
}

/** Share of overall progress spent rendering batches; the rest is concatenation. */
const BATCH_PHASE = 0.8;

export function getBatchPath(outputPath: string, batchIndex: number, strategy: ExportStrategy): string {
  return `${outputPath}.batch${batchIndex}${getStrategyExtension(strategy)}`;
}

/**
 * Renders a composition to one file. Small compositions are rendered in one
 * go. Larger ones are rendered batch by batch into temporaries that are then
 * concatenated; a failed batch is logged and skipped. Only when no batch
 * succeeds does the export fail. Temporaries are always removed.
 */
export async function exportSupercut(options: ExportSupercutOptions): Promise<BatchExportReport> {
  const { composition, renderer, onProgress, signal } = options;
  const logger = options.logger ?? {};
  const batchSize = options.batchSize ?? BATCH_SIZE;

  if (composition.length === 0) {
    throw createExportError(ExportErrorCode.EXPORT_TOTAL_FAILURE, 'Nothing to export: the composition is empty');
  }

  const strategy = planOutputStrategy(composition, options.outputPath);
  const outputPath = resolveOutputPath(options.outputPath, strategy);
  if (outputPath !== options.outputPath) {
    logger.info?.('export.output.renamed', { from: options.outputPath, to: outputPath });
  }

  if (composition.length <= batchSize) {
    try {
      await renderer.renderClips(composition, outputPath, strategy, {
        signal,
        onProgress: (fraction) => onProgress?.({ fraction, stage: 'render', batchIndex: 0, totalBatches: 1 }),
      });
    } catch (error) {
      throw createExportError(ExportErrorCode.EXPORT_TOTAL_FAILURE, `Failed to create supercut: ${toError(error).message}`, {
        filePath: outputPath,
        cause: error,
      });
    } finally {
      await cleanupScratchLogs(outputPath, logger);
    }
    onProgress?.({ fraction: 1, stage: 'done' });
    return { outputPath, strategy, totalBatches: 1, succeeded: 1, failed: [], successRatio: 1 };
  }

  const batches = chunkComposition(composition, batchSize);
  const totalBatches = batches.length;
  const attempted: string[] = [];
  const batchFiles: string[] = [];
  const failed: BatchFailure[] = [];

  try {
    for (const [batchIndex, batch] of batches.entries()) {
      if (signal?.aborted) {
        throw createExportError(ExportErrorCode.RENDER_CANCELLED, 'Export cancelled', { filePath: outputPath });
      }
      const batchPath = getBatchPath(outputPath, batchIndex, strategy);
      attempted.push(batchPath);
      try {
        await renderer.renderClips(batch, batchPath, strategy, {
          signal,
          onProgress: (fraction) =>
            onProgress?.({
              fraction: ((batchIndex + fraction) / totalBatches) * BATCH_PHASE,
              stage: 'render',
              batchIndex,
              totalBatches,
            }),
        });
        batchFiles.push(batchPath);
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        const batchError = createExportError(
          ExportErrorCode.BATCH_FAILED,
          `Batch ${batchIndex + 1} of ${totalBatches} failed: ${toError(error).message}`,
          { filePath: batchPath, context: `batch ${batchIndex + 1} of ${totalBatches}`, cause: error },
        );
        logger.error?.('export.batch.failed', { code: batchError.code, batchIndex, message: batchError.message });
        failed.push({ batchIndex, error: batchError });
      }
    }

    if (batchFiles.length === 0) {
      throw createExportError(ExportErrorCode.EXPORT_TOTAL_FAILURE, `All ${totalBatches} batches failed to render`, {
        filePath: outputPath,
        cause: failed[0]?.error,
      });
    }

    if (failed.length > 0) {
      logger.warn?.('export.partial', { succeeded: batchFiles.length, failed: failed.length, totalBatches });
    }

    onProgress?.({ fraction: BATCH_PHASE, stage: 'concatenate', totalBatches });
    await renderer.concatenate(batchFiles, outputPath, strategy, {
      signal,
      onProgress: (fraction) =>
        onProgress?.({ fraction: BATCH_PHASE + fraction * (1 - BATCH_PHASE), stage: 'concatenate', totalBatches }),
    });
  } finally {
    await removeFiles(attempted, logger);
    await cleanupScratchLogs(outputPath, logger);
  }

  onProgress?.({ fraction: 1, stage: 'done' });
  return {
    outputPath,
    strategy,
    totalBatches,
    succeeded: batchFiles.length,
    failed,
    successRatio: batchFiles.length / totalBatches,
  };
}

export interface ExportClipsOptions {
  composition: Composition;
  /** Clip files are named `<base>_<index padded to 5><ext>`. */
  outputPath: string;
  renderer: MediaRenderer;
  onProgress?: (fraction: number) => void;
  signal?: AbortSignal;
  logger?: Partial<Logger>;
}

export interface ExportedClip {
  clip: Match;
  outputPath: string;
}

export function getClipPath(outputPath: string, index: number, strategy: ExportStrategy): string {
  const finalPath = resolveOutputPath(outputPath, strategy);
  const ext = extname(finalPath);
  const base = finalPath.slice(0, finalPath.length - ext.length);
  return `${base}_${String(index).padStart(5, '0')}${ext}`;
}

/**
 * Renders every clip to its own file. Failures are collected per clip; the
 * call only throws when no clip could be rendered.
 */
export async function exportIndividualClips(
  options: ExportClipsOptions,
): Promise<ItemSummary<Match, ExportedClip, TranscutError>> {
  const { composition, renderer, onProgress, signal } = options;
  const logger = options.logger ?? {};
  const strategy = planOutputStrategy(composition, options.outputPath);
  const summary: ItemSummary<Match, ExportedClip, TranscutError> = { succeeded: [], failed: [] };

  for (const [index, clip] of composition.entries()) {
    if (signal?.aborted) {
      throw createExportError(ExportErrorCode.RENDER_CANCELLED, 'Export cancelled', { filePath: options.outputPath });
    }
    const clipPath = getClipPath(options.outputPath, index, strategy);
    try {
      await renderer.renderClips([clip], clipPath, strategy, {
        signal,
        onProgress: (fraction) => onProgress?.((index + fraction) / composition.length),
      });
      summary.succeeded.push({ clip, outputPath: clipPath });
    } catch (error) {
      const clipError = createExportError(
        ExportErrorCode.RENDER_FAILED,
        `Clip ${index} failed: ${toError(error).message}`,
        { filePath: clipPath, cause: error },
      );
      logger.error?.('export.clip.failed', { index, message: clipError.message });
      summary.failed.push({ item: clip, error: clipError });
    }
  }

  await cleanupScratchLogs(options.outputPath, logger);

  if (composition.length > 0 && summary.succeeded.length === 0) {
    throw createExportError(
      ExportErrorCode.EXPORT_TOTAL_FAILURE,
      `Failed to export individual clips: all ${composition.length} clips failed`,
      { filePath: options.outputPath, cause: summary.failed[0]?.error },
    );
  }
  onProgress?.(1);
  return summary;
}

async function removeFiles(paths: readonly string[], logger: Partial<Logger>): Promise<void> {
  for (const path of paths) {
    try {
      await rm(path, { force: true });
    } catch (error) {
      logger.warn?.('export.cleanup.failed', { path, message: toError(error).message });
    }
  }
}

/** Removes renderer scratch logs (`*ogg.log`) left in the output directory. */
export async function cleanupScratchLogs(outputPath: string, logger: Partial<Logger> = {}): Promise<void> {
  const directory = dirname(resolve(outputPath));
  let names: string[];
  try {
    names = await readdir(directory);
  } catch (error) {
    logger.debug?.('export.cleanup.skipped', { directory, message: toError(error).message });
    return;
  }
  await removeFiles(
    names.filter((name) => name.endsWith('ogg.log')).map((name) => join(directory, name)),
    logger,
  );
}
