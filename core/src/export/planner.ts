import { extname } from 'node:path';
import {
  AUDIO_EXTENSIONS,
  AUDIO_OUTPUT_EXTENSIONS,
  DEFAULT_OUTPUT_FILE,
  VIDEO_EXTENSIONS,
  VIDEO_OUTPUT_EXTENSIONS,
} from '../config.js';
import { ExportErrorCode, createExportError } from '../errors/index.js';
import type { Composition, ExportStrategy, MediaType } from '../types.js';

function includesExtension(list: readonly string[], ext: string): boolean {
  return list.includes(ext);
}

export function getMediaType(filePath: string): MediaType {
  const ext = extname(filePath).toLowerCase();
  if (includesExtension(VIDEO_EXTENSIONS, ext)) {
    return 'video';
  }
  if (includesExtension(AUDIO_EXTENSIONS, ext)) {
    return 'audio';
  }
  return 'unknown';
}

/** `video` when any source is video, else `audio` when any is audio. */
export function getInputType(composition: Composition): MediaType {
  const types = new Set([...new Set(composition.map((clip) => clip.file))].map(getMediaType));
  if (types.has('video')) {
    return 'video';
  }
  if (types.has('audio')) {
    return 'audio';
  }
  return 'unknown';
}

/**
 * Chooses whether the output is rendered as video or audio.
 *
 * Audio-only sources cannot produce a video container, except for the
 * implicit default output name which is rewritten to `.mp3` instead.
 */
export function planOutputStrategy(composition: Composition, outputPath: string): ExportStrategy {
  const inputType = getInputType(composition);
  const outputExt = extname(outputPath).toLowerCase();
  const audioOutput = includesExtension(AUDIO_OUTPUT_EXTENSIONS, outputExt);

  if (
    inputType === 'audio' &&
    includesExtension(VIDEO_OUTPUT_EXTENSIONS, outputExt) &&
    outputPath !== DEFAULT_OUTPUT_FILE
  ) {
    throw createExportError(
      ExportErrorCode.INCOMPATIBLE_OUTPUT_FORMAT,
      'Cannot convert audio input to video output',
      {
        filePath: outputPath,
        suggestion: 'Use an audio output format like .mp3 or .wav.',
      },
    );
  }

  if (inputType === 'video' && !audioOutput) {
    return 'video';
  }
  if (inputType === 'audio' || audioOutput) {
    return 'audio';
  }
  return 'video';
}

/** An `.mp4` output rendered as audio becomes `.mp3`. */
export function resolveOutputPath(outputPath: string, strategy: ExportStrategy): string {
  if (strategy === 'audio' && extname(outputPath).toLowerCase() === '.mp4') {
    return `${outputPath.slice(0, -'.mp4'.length)}.mp3`;
  }
  return outputPath;
}

/** Container extension for intermediates of a strategy. */
export function getStrategyExtension(strategy: ExportStrategy): string {
  return strategy === 'video' ? '.mp4' : '.mp3';
}

/** Splits a composition into contiguous batches, preserving order. */
export function chunkComposition(composition: Composition, batchSize: number): Composition[] {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new RangeError(`batchSize must be a positive integer (received ${batchSize})`);
  }
  const batches: Composition[] = [];
  for (let i = 0; i < composition.length; i += batchSize) {
    batches.push(composition.slice(i, i + batchSize));
  }
  return batches;
}
