import type { ExportStrategy } from '@transcut/core';

export interface FfmpegCommand {
  ffmpegPath: string;
  args: string[];
  outputPath: string;
}

export interface FfmpegEncodeOptions {
  ffmpegPath: string;
  videoCodec: string;
  /** x264 preset */
  preset: string;
  crf: number;
  audioBitrate: string;
}

export interface FfmpegProgressSnapshot {
  timeSeconds: number;
  fps: number | null;
  speed: number | null;
}

export interface BuildClipsCommandArgs {
  clips: ReadonlyArray<{ file: string; start: number; end: number }>;
  outputPath: string;
  strategy: ExportStrategy;
}

export const FFMPEG_DEFAULTS: FfmpegEncodeOptions = {
  ffmpegPath: 'ffmpeg',
  videoCodec: 'libx264',
  preset: 'medium',
  crf: 23,
  audioBitrate: '192k',
};
