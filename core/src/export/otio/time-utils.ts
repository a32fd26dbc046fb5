/**
 * Time conversion utilities for OpenTimelineIO export.
 *
 * OTIO expresses time as (value / rate), here frames at the timeline fps.
 */

import type { OTIORationalTime, OTIOTimeRange } from './types.js';

/**
 * Creates a RationalTime from seconds, rounding to the nearest frame.
 *
 * @example
 * // 2.5 seconds at 30 fps = 75 frames
 * createRationalTime(2.5, 30) // { value: 75, rate: 30 }
 */
export function createRationalTime(seconds: number, fps: number): OTIORationalTime {
  return {
    OTIO_SCHEMA: 'RationalTime.1',
    value: Math.round(seconds * fps),
    rate: fps,
  };
}

export function createTimeRange(startSeconds: number, durationSeconds: number, fps: number): OTIOTimeRange {
  return {
    OTIO_SCHEMA: 'TimeRange.1',
    start_time: createRationalTime(startSeconds, fps),
    duration: createRationalTime(durationSeconds, fps),
  };
}

export function createZeroTime(fps: number): OTIORationalTime {
  return createRationalTime(0, fps);
}

export function rationalTimeToSeconds(time: OTIORationalTime): number {
  return time.value / time.rate;
}
