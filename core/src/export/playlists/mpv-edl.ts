import { resolve } from 'node:path';
import type { Composition } from '../../types.js';

/** mpv edit decision list: `path,start,duration` per clip with absolute paths. */
export function renderMpvEdl(composition: Composition): string {
  const lines = ['# mpv EDL v0'];
  for (const clip of composition) {
    lines.push(`${resolve(clip.file)},${clip.start},${clip.end - clip.start}`);
  }
  return lines.join('\n');
}
