import { extname } from 'node:path';
import type { ExportStrategy } from '@transcut/core';
import type { BuildClipsCommandArgs, FfmpegCommand, FfmpegEncodeOptions, FfmpegProgressSnapshot } from './types.js';
import { FFMPEG_DEFAULTS } from './types.js';

/** Audio encoder per output container; anything else gets AAC. */
const AUDIO_CODECS: Record<string, string> = {
  '.mp3': 'libmp3lame',
  '.wav': 'pcm_s16le',
  '.flac': 'flac',
  '.ogg': 'libvorbis',
};

export function getAudioCodec(outputPath: string): string {
  return AUDIO_CODECS[extname(outputPath).toLowerCase()] ?? 'aac';
}

function formatSeconds(value: number): string {
  return Number(value.toFixed(3)).toString();
}

/**
 * Trims each clip with input seeking and joins them with the concat filter
 * in one pass.
 *
 * Video: `[0:v][0:a][1:v][1:a]concat=n=2:v=1:a=1[outv][outa]`
 * Audio: `[0:a][1:a]concat=n=2:v=0:a=1[outa]`
 */
export function buildClipsCommand(
  { clips, outputPath, strategy }: BuildClipsCommandArgs,
  options: Partial<FfmpegEncodeOptions> = {},
): FfmpegCommand {
  if (clips.length === 0) {
    throw new RangeError('Cannot build an FFmpeg command without clips');
  }
  const encode = { ...FFMPEG_DEFAULTS, ...options };
  const args: string[] = ['-y', '-hide_banner'];

  for (const clip of clips) {
    args.push('-ss', formatSeconds(clip.start), '-t', formatSeconds(Math.max(0, clip.end - clip.start)), '-i', clip.file);
  }

  const video = strategy === 'video';
  const streams = clips.map((_, index) => (video ? `[${index}:v][${index}:a]` : `[${index}:a]`)).join('');
  const outputs = video ? '[outv][outa]' : '[outa]';
  args.push('-filter_complex', `${streams}concat=n=${clips.length}:v=${video ? 1 : 0}:a=1${outputs}`);

  if (video) {
    args.push(
      '-map', '[outv]',
      '-map', '[outa]',
      '-c:v', encode.videoCodec,
      '-preset', encode.preset,
      '-crf', String(encode.crf),
      '-pix_fmt', 'yuv420p',
      '-c:a', 'aac',
      '-b:a', encode.audioBitrate,
    );
  } else {
    const audioCodec = getAudioCodec(outputPath);
    args.push('-map', '[outa]', '-vn', '-c:a', audioCodec);
    if (audioCodec !== 'pcm_s16le' && audioCodec !== 'flac') {
      args.push('-b:a', encode.audioBitrate);
    }
  }

  args.push(outputPath);
  return { ffmpegPath: encode.ffmpegPath, args, outputPath };
}

/** Body of a concat-demuxer list file. Single quotes are escaped as `'\''`. */
export function buildConcatList(inputs: readonly string[]): string {
  return inputs.map((input) => `file '${input.replace(/'/g, `'\\''`)}'`).join('\n') + '\n';
}

/**
 * Joins already-encoded intermediates with the concat demuxer. Streams are
 * copied when the container matches the intermediates, re-encoded otherwise.
 */
export function buildConcatCommand(
  listPath: string,
  outputPath: string,
  strategy: ExportStrategy,
  options: Partial<FfmpegEncodeOptions> = {},
): FfmpegCommand {
  const encode = { ...FFMPEG_DEFAULTS, ...options };
  const args = ['-y', '-hide_banner', '-f', 'concat', '-safe', '0', '-i', listPath];
  const ext = extname(outputPath).toLowerCase();

  if ((strategy === 'video' && ext === '.mp4') || (strategy === 'audio' && ext === '.mp3')) {
    args.push('-c', 'copy');
  } else if (strategy === 'video') {
    args.push('-c:v', encode.videoCodec, '-preset', encode.preset, '-crf', String(encode.crf), '-c:a', 'aac');
  } else {
    args.push('-vn', '-c:a', getAudioCodec(outputPath));
  }

  args.push(outputPath);
  return { ffmpegPath: encode.ffmpegPath, args, outputPath };
}

export function parseFfmpegProgressLine(line: string): FfmpegProgressSnapshot | null {
  const timeMatch = line.match(/time=(\d{2}):(\d{2}):(\d{2}(?:\.\d+)?)/);
  if (!timeMatch) {
    return null;
  }

  const hours = Number(timeMatch[1]);
  const minutes = Number(timeMatch[2]);
  const seconds = Number(timeMatch[3]);
  const timeSeconds = hours * 3600 + minutes * 60 + seconds;

  const fpsMatch = line.match(/fps=\s*([0-9.]+)/);
  const speedMatch = line.match(/speed=\s*([0-9.]+)x/);

  return {
    timeSeconds,
    fps: fpsMatch ? Number(fpsMatch[1]) : null,
    speed: speedMatch ? Number(speedMatch[1]) : null,
  };
}
