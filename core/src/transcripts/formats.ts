import { extname } from 'node:path';

/**
 * Transcript formats the store can parse. `unknown` covers any other
 * extension so dispatch stays exhaustive.
 */
export type TranscriptFormat =
  | { kind: 'json'; extension: '.json' }
  | { kind: 'vtt'; extension: '.vtt' }
  | { kind: 'srt'; extension: '.srt' }
  | { kind: 'sphinx'; extension: '.transcript' }
  | { kind: 'unknown'; extension: string };

export type TranscriptFormatKind = TranscriptFormat['kind'];

export function detectTranscriptFormat(transcriptPath: string): TranscriptFormat {
  const extension = extname(transcriptPath).toLowerCase();
  switch (extension) {
    case '.json':
      return { kind: 'json', extension };
    case '.vtt':
      return { kind: 'vtt', extension };
    case '.srt':
      return { kind: 'srt', extension };
    case '.transcript':
      return { kind: 'sphinx', extension };
    default:
      return { kind: 'unknown', extension };
  }
}
