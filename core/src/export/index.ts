/**
 * Export of compositions: supercuts and individual clips through a
 * MediaRenderer, playlists (m3u, mpv EDL), WebVTT subtitles and OTIO timelines.
 */

export {
  getMediaType,
  getInputType,
  planOutputStrategy,
  resolveOutputPath,
  getStrategyExtension,
  chunkComposition,
} from './planner.js';
export type { MediaRenderer, RenderOptions } from './renderer.js';
export {
  exportSupercut,
  exportIndividualClips,
  getBatchPath,
  getClipPath,
  cleanupScratchLogs,
  type ExportProgressEvent,
  type ExportSupercutOptions,
  type ExportClipsOptions,
  type ExportedClip,
  type BatchFailure,
  type BatchExportReport,
} from './batch-exporter.js';
export {
  exportComposition,
  resolveExportMode,
  getSidecarVttPath,
  type ExportMode,
  type ExportCompositionOptions,
  type ExportCompositionResult,
} from './export-composition.js';
export { renderM3u } from './playlists/m3u.js';
export { renderMpvEdl } from './playlists/mpv-edl.js';
export { renderCompositionVtt } from './playlists/vtt-writer.js';

// OTIO export for DaVinci Resolve, Premiere Pro, and other NLEs
export * from './otio/index.js';
