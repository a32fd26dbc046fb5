import type { Composition } from '../../types.js';

/**
 * VLC-compatible M3U playlist: each entry plays only the clip's time range.
 */
export function renderM3u(composition: Composition): string {
  const lines = ['#EXTM3U'];
  for (const clip of composition) {
    lines.push('#EXTINF:');
    lines.push(`#EXTVLCOPT:start-time=${clip.start}`);
    lines.push(`#EXTVLCOPT:stop-time=${clip.end}`);
    lines.push(clip.file);
  }
  return lines.join('\n');
}
