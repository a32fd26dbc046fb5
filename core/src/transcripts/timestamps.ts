/**
 * Matches `HH:MM:SS.mmm`, `MM:SS.mmm` and the SRT comma variant `HH:MM:SS,mmm`.
 */
export const TIMESTAMP_PATTERN = /(?:\d+:)?\d{1,2}:\d{2}(?:[.,]\d{1,3})?/;

const TIMING_LINE = new RegExp(`(${TIMESTAMP_PATTERN.source})\\s*-->\\s*(${TIMESTAMP_PATTERN.source})`);

/**
 * Converts a cue timestamp to seconds. Hours are optional.
 * Returns null when the value is not a timestamp.
 */
export function parseTimestamp(value: string): number | null {
  const trimmed = value.trim();
  const match = /^(?:(\d+):)?(\d{1,2}):(\d{2})(?:[.,](\d{1,3}))?$/.exec(trimmed);
  if (!match) {
    return null;
  }
  const hours = match[1] ? Number(match[1]) : 0;
  const minutes = Number(match[2]);
  const seconds = Number(match[3]);
  const millis = match[4] ? Number(match[4].padEnd(3, '0')) : 0;
  return hours * 3600 + minutes * 60 + seconds + millis / 1000;
}

export interface TimingLine {
  start: number;
  end: number;
}

/**
 * Parses a `start --> end [settings]` line. Anything after the end time is ignored.
 */
export function parseTimingLine(line: string): TimingLine | null {
  const match = TIMING_LINE.exec(line);
  if (!match) {
    return null;
  }
  const start = parseTimestamp(match[1]);
  const end = parseTimestamp(match[2]);
  if (start === null || end === null) {
    return null;
  }
  return { start, end };
}

/** Formats seconds as a WebVTT timestamp (`HH:MM:SS.mmm`). */
export function formatVttTimestamp(totalSeconds: number): string {
  const totalMillis = Math.max(0, Math.round(totalSeconds * 1000));
  const hours = Math.floor(totalMillis / 3_600_000);
  const minutes = Math.floor((totalMillis % 3_600_000) / 60_000);
  const seconds = Math.floor((totalMillis % 60_000) / 1000);
  const millis = totalMillis % 1000;
  return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(millis, 3)}`;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}
