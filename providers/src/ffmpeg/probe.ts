import { ExportErrorCode, createExportError, toError } from '@transcut/core';
import type { Logger } from '@transcut/core';
import { runMediaTool } from './process.js';

export interface ProbeOptions {
  ffprobePath?: string;
  signal?: AbortSignal;
}

/** Container duration in seconds, read with ffprobe. */
export async function probeDuration(mediaPath: string, options: ProbeOptions = {}): Promise<number> {
  const ffprobePath = options.ffprobePath ?? 'ffprobe';
  const stdout = await runMediaTool(
    ffprobePath,
    ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', mediaPath],
    { signal: options.signal },
  );

  const duration = Number.parseFloat(stdout.trim());
  if (!Number.isFinite(duration) || duration < 0) {
    throw createExportError(ExportErrorCode.RENDER_FAILED, `${ffprobePath} reported no duration for ${mediaPath}`, {
      filePath: mediaPath,
    });
  }
  return duration;
}

/**
 * Durations of many files, keyed by path. Files that cannot be probed are
 * logged and left out.
 */
export async function probeDurations(
  files: readonly string[],
  options: ProbeOptions & { logger?: Partial<Logger> } = {},
): Promise<Map<string, number>> {
  const durations = new Map<string, number>();
  for (const file of new Set(files)) {
    try {
      durations.set(file, await probeDuration(file, options));
    } catch (error) {
      options.logger?.warn?.('probe.failed', { file, message: toError(error).message });
    }
  }
  return durations;
}
