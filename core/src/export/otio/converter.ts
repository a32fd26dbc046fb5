/**
 * Converts a composition into an OTIO timeline: one track whose clips point
 * at the source media with the matched ranges.
 */

import { basename } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { Composition } from '../../types.js';
import type { OTIOClip, OTIOExportOptions, OTIOExportResult, OTIOStack, OTIOTimeline } from './types.js';
import { createTimeRange, createZeroTime, rationalTimeToSeconds } from './time-utils.js';

export function convertCompositionToOTIO(composition: Composition, options: OTIOExportOptions): OTIOExportResult {
  const { fps } = options;
  const kind = options.kind ?? 'Video';

  const clips = composition.map((clip, index): OTIOClip => ({
    OTIO_SCHEMA: 'Clip.2',
    name: `${basename(clip.file)} #${index + 1}`,
    source_range: createTimeRange(clip.start, clip.end - clip.start, fps),
    media_references: {
      DEFAULT_MEDIA: {
        OTIO_SCHEMA: 'ExternalReference.1',
        name: basename(clip.file),
        target_url: pathToFileURL(clip.file).href,
      },
    },
    active_media_reference_key: 'DEFAULT_MEDIA',
    metadata: {
      transcut: {
        content: clip.content,
        ...(clip.score !== undefined ? { score: clip.score } : {}),
      },
    },
  }));

  const stack: OTIOStack = {
    OTIO_SCHEMA: 'Stack.1',
    name: 'Tracks',
    children: [
      {
        OTIO_SCHEMA: 'Track.1',
        name: kind === 'Video' ? 'V1' : 'A1',
        kind,
        children: clips,
      },
    ],
  };

  const duration = clips.reduce((total, clip) => total + rationalTimeToSeconds(clip.source_range.duration), 0);

  const timeline: OTIOTimeline = {
    OTIO_SCHEMA: 'Timeline.1',
    name: options.name ?? 'Supercut',
    global_start_time: createZeroTime(fps),
    tracks: stack,
    metadata: {
      transcut: {
        clipCount: clips.length,
      },
    },
  };

  return {
    timeline,
    otioJson: JSON.stringify(timeline, null, 2),
    stats: { clipCount: clips.length, duration, fps },
  };
}
