import { writeFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { ExportErrorCode, createExportError } from '../errors/index.js';
import type { TranscutError } from '../errors/index.js';
import type { Logger } from '../logger.js';
import type { Composition, ItemSummary, Match } from '../types.js';
import { exportIndividualClips, exportSupercut } from './batch-exporter.js';
import type { BatchExportReport, ExportedClip, ExportProgressEvent } from './batch-exporter.js';
import { exportCompositionToOTIO } from './otio/index.js';
import { planOutputStrategy } from './planner.js';
import { renderM3u } from './playlists/m3u.js';
import { renderMpvEdl } from './playlists/mpv-edl.js';
import { renderCompositionVtt } from './playlists/vtt-writer.js';
import type { MediaRenderer } from './renderer.js';

export type ExportMode = 'supercut' | 'clips' | 'm3u' | 'mpv-edl' | 'otio';

const DEFAULT_OTIO_FPS = 25;

export function resolveExportMode(outputPath: string, exportClips = false): ExportMode {
  if (exportClips) {
    return 'clips';
  }
  const lower = outputPath.toLowerCase();
  if (lower.endsWith('.m3u')) {
    return 'm3u';
  }
  if (lower.endsWith('.mpv.edl')) {
    return 'mpv-edl';
  }
  if (lower.endsWith('.otio')) {
    return 'otio';
  }
  return 'supercut';
}

export function getSidecarVttPath(outputPath: string): string {
  return `${outputPath.slice(0, outputPath.length - extname(outputPath).length)}.vtt`;
}

export interface ExportCompositionOptions {
  composition: Composition;
  outputPath: string;
  /** Needed for supercuts and individual clips. */
  renderer?: MediaRenderer;
  exportClips?: boolean;
  /** Also write `<output stem>.vtt` with the composition's subtitles. */
  writeVtt?: boolean;
  batchSize?: number;
  /** Frame rate of OTIO timelines. */
  fps?: number;
  onProgress?: (event: ExportProgressEvent) => void;
  signal?: AbortSignal;
  logger?: Partial<Logger>;
}

export type ExportCompositionResult = { vttPath?: string } & (
  | { mode: 'supercut'; outputPath: string; report: BatchExportReport }
  | { mode: 'clips'; outputPath: string; summary: ItemSummary<Match, ExportedClip, TranscutError> }
  | { mode: 'm3u' | 'mpv-edl' | 'otio'; outputPath: string }
);

/**
 * Writes a composition in the form its output path asks for: a playlist, an
 * OTIO timeline, individual clips or a single supercut.
 */
export async function exportComposition(options: ExportCompositionOptions): Promise<ExportCompositionResult> {
  const { composition, outputPath } = options;
  const logger = options.logger ?? {};
  const mode = resolveExportMode(outputPath, options.exportClips);
  logger.info?.('export.start', { mode, outputPath, clips: composition.length });

  const result = await runExport(mode, options);

  if (options.writeVtt) {
    const vttPath = getSidecarVttPath(outputPath);
    await writeFile(vttPath, renderCompositionVtt(composition), 'utf8');
    logger.info?.('export.vtt.written', { vttPath });
    return { ...result, vttPath };
  }
  return result;
}

async function runExport(mode: ExportMode, options: ExportCompositionOptions): Promise<ExportCompositionResult> {
  const { composition, outputPath } = options;

  switch (mode) {
    case 'm3u':
      await writeFile(outputPath, renderM3u(composition), 'utf8');
      return { mode, outputPath };
    case 'mpv-edl':
      await writeFile(outputPath, renderMpvEdl(composition), 'utf8');
      return { mode, outputPath };
    case 'otio': {
      const strategy = planOutputStrategy(composition, outputPath);
      const { otioJson } = exportCompositionToOTIO({
        composition,
        options: {
          fps: options.fps ?? DEFAULT_OTIO_FPS,
          name: basename(outputPath, extname(outputPath)),
          kind: strategy === 'video' ? 'Video' : 'Audio',
        },
      });
      await writeFile(outputPath, otioJson, 'utf8');
      return { mode, outputPath };
    }
    case 'clips': {
      const summary = await exportIndividualClips({
        composition,
        outputPath,
        renderer: requireRenderer(options.renderer),
        signal: options.signal,
        logger: options.logger,
        onProgress: (fraction) => options.onProgress?.({ fraction, stage: fraction >= 1 ? 'done' : 'render' }),
      });
      return { mode, outputPath, summary };
    }
    case 'supercut': {
      const report = await exportSupercut({
        composition,
        outputPath,
        renderer: requireRenderer(options.renderer),
        batchSize: options.batchSize,
        onProgress: options.onProgress,
        signal: options.signal,
        logger: options.logger,
      });
      return { mode, outputPath: report.outputPath, report };
    }
  }
}

function requireRenderer(renderer: MediaRenderer | undefined): MediaRenderer {
  if (!renderer) {
    throw createExportError(ExportErrorCode.RENDERER_NOT_FOUND, 'No media renderer is configured', {
      suggestion: 'Install FFmpeg or pass a MediaRenderer.',
    });
  }
  return renderer;
}
