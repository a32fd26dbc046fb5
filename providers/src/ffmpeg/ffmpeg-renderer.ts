import { mkdir, rm, stat, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { ExportErrorCode, createExportError } from '@transcut/core';
import type { Logger, MediaRenderer, RenderOptions } from '@transcut/core';
import { buildClipsCommand, buildConcatCommand, buildConcatList, parseFfmpegProgressLine } from './command-builder.js';
import { runMediaTool } from './process.js';
import type { FfmpegCommand, FfmpegEncodeOptions } from './types.js';

const FFMPEG_PROGRESS_PERCENT_STEP = 5;

export interface FfmpegRendererOptions extends Partial<FfmpegEncodeOptions> {
  logger?: Partial<Logger>;
}

async function assertInputsExist(files: readonly string[]): Promise<void> {
  for (const file of new Set(files)) {
    try {
      await stat(file);
    } catch (error) {
      throw createExportError(ExportErrorCode.MISSING_INPUT, `FFmpeg input file not found: ${file}`, {
        filePath: file,
        cause: error,
      });
    }
  }
}

/**
 * MediaRenderer backed by the ffmpeg binary. Clips are trimmed and joined in
 * one filter graph; intermediates are joined with the concat demuxer.
 */
export function createFfmpegRenderer(options: FfmpegRendererOptions = {}): MediaRenderer {
  const { logger = {}, ...encode } = options;

  const run = async (command: FfmpegCommand, totalSeconds: number, renderOptions: RenderOptions): Promise<void> => {
    const { signal, onProgress } = renderOptions;
    const startedAt = Date.now();
    let lastReportedBucket = -1;

    try {
      await runMediaTool(command.ffmpegPath, command.args, {
        signal,
        onStderrLine: (line) => {
          const snapshot = parseFfmpegProgressLine(line);
          if (!snapshot || !onProgress || totalSeconds <= 0) {
            return;
          }
          const fraction = Math.min(1, snapshot.timeSeconds / totalSeconds);
          const bucket = Math.floor((fraction * 100) / FFMPEG_PROGRESS_PERCENT_STEP);
          if (bucket <= lastReportedBucket) {
            return;
          }
          lastReportedBucket = bucket;
          onProgress(fraction);
        },
      });
    } finally {
      logger.debug?.('ffmpeg.run.finished', {
        outputPath: command.outputPath,
        elapsedSeconds: Math.max(1, Math.floor((Date.now() - startedAt) / 1000)),
      });
    }
    onProgress?.(1);
  };

  return {
    async renderClips(clips, outputPath, strategy, renderOptions: RenderOptions = {}) {
      await assertInputsExist(clips.map((clip) => clip.file));
      await mkdir(dirname(resolve(outputPath)), { recursive: true });

      const command = buildClipsCommand({ clips, outputPath, strategy }, encode);
      const totalSeconds = clips.reduce((sum, clip) => sum + Math.max(0, clip.end - clip.start), 0);
      logger.info?.('ffmpeg.render.start', { outputPath, clips: clips.length, strategy });
      await run(command, totalSeconds, renderOptions);
    },

    async concatenate(inputs, outputPath, strategy, renderOptions: RenderOptions = {}) {
      if (inputs.length === 0) {
        throw createExportError(ExportErrorCode.MISSING_INPUT, 'No intermediate files to concatenate', {
          filePath: outputPath,
        });
      }
      await assertInputsExist(inputs);

      const listPath = `${outputPath}.concat.txt`;
      await writeFile(listPath, buildConcatList(inputs.map((input) => resolve(input))), 'utf8');
      logger.info?.('ffmpeg.concat.start', { outputPath, inputs: inputs.length, strategy });
      try {
        await run(buildConcatCommand(listPath, outputPath, strategy, encode), 0, renderOptions);
      } finally {
        await rm(listPath, { force: true });
      }
    },
  };
}
