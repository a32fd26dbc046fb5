import { formatVttTimestamp } from '../../transcripts/timestamps.js';
import type { Composition } from '../../types.js';

/**
 * WebVTT subtitles for a rendered composition. Cues follow the supercut's own
 * timeline: each clip starts where the previous one ended.
 */
export function renderCompositionVtt(composition: Composition): string {
  let output = 'WEBVTT\n';
  let cursor = 0;
  composition.forEach((clip, index) => {
    const end = cursor + (clip.end - clip.start);
    output += `\n${index}\n${formatVttTimestamp(cursor)} --> ${formatVttTimestamp(end)}\n${clip.content}\n`;
    cursor = end;
  });
  return output;
}
