export { createFfmpegRenderer, type FfmpegRendererOptions } from './ffmpeg/ffmpeg-renderer.js';
export { probeDuration, probeDurations, type ProbeOptions } from './ffmpeg/probe.js';
export {
  buildClipsCommand,
  buildConcatCommand,
  buildConcatList,
  getAudioCodec,
  parseFfmpegProgressLine,
} from './ffmpeg/command-builder.js';
export { runMediaTool, type RunMediaToolOptions } from './ffmpeg/process.js';
export { FFMPEG_DEFAULTS } from './ffmpeg/types.js';
export type { FfmpegCommand, FfmpegEncodeOptions, FfmpegProgressSnapshot, BuildClipsCommandArgs } from './ffmpeg/types.js';
export { createAiEmbeddingProvider, type AiEmbeddingProviderOptions } from './embeddings/ai-embedding-provider.js';
