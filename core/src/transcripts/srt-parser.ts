import type { Segment } from '../types.js';
import { parseCueBlocks } from './cue-blocks.js';

/**
 * Parses SubRip blocks (`index / start --> end / text...`). Either `,` or `.`
 * may separate milliseconds. SRT carries no word timing.
 */
export function parseSrt(text: string, file: string): Segment[] {
  return parseCueBlocks(text.replace(/^\uFEFF/, ''), file);
}
