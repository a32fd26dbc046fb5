import { describe, it, expect } from 'vitest';
import { exportCompositionToOTIO } from './index.js';
import { createRationalTime, createTimeRange } from './time-utils.js';

describe('time utils', () => {
  it('rounds seconds to frames', () => {
    expect(createRationalTime(2.5, 30)).toEqual({ OTIO_SCHEMA: 'RationalTime.1', value: 75, rate: 30 });
    expect(createRationalTime(1.01, 25)).toEqual({ OTIO_SCHEMA: 'RationalTime.1', value: 25, rate: 25 });
  });

  it('builds a range from start and duration', () => {
    expect(createTimeRange(1, 2, 10)).toEqual({
      OTIO_SCHEMA: 'TimeRange.1',
      start_time: { OTIO_SCHEMA: 'RationalTime.1', value: 10, rate: 10 },
      duration: { OTIO_SCHEMA: 'RationalTime.1', value: 20, rate: 10 },
    });
  });
});

describe('exportCompositionToOTIO', () => {
  const composition = [
    { file: '/media/talk.mp4', start: 1, end: 3, content: 'first line' },
    { file: '/media/other.mp4', start: 10, end: 10.5, content: 'second', score: 0.8 },
  ];

  it('creates one clip per composition entry on a single track', () => {
    const { timeline, stats } = exportCompositionToOTIO({ composition, options: { fps: 24, name: 'Cut' } });
    const [track] = timeline.tracks.children;

    expect(timeline.name).toBe('Cut');
    expect(track.kind).toBe('Video');
    expect(track.children).toHaveLength(2);
    expect(track.children[0]).toEqual({
      OTIO_SCHEMA: 'Clip.2',
      name: 'talk.mp4 #1',
      source_range: {
        OTIO_SCHEMA: 'TimeRange.1',
        start_time: { OTIO_SCHEMA: 'RationalTime.1', value: 24, rate: 24 },
        duration: { OTIO_SCHEMA: 'RationalTime.1', value: 48, rate: 24 },
      },
      media_references: {
        DEFAULT_MEDIA: {
          OTIO_SCHEMA: 'ExternalReference.1',
          name: 'talk.mp4',
          target_url: 'file:///media/talk.mp4',
        },
      },
      active_media_reference_key: 'DEFAULT_MEDIA',
      metadata: { transcut: { content: 'first line' } },
    });
    expect(track.children[1].metadata).toEqual({ transcut: { content: 'second', score: 0.8 } });
    expect(stats).toEqual({ clipCount: 2, duration: 2.5, fps: 24 });
  });

  it('uses an audio track when asked', () => {
    const { timeline } = exportCompositionToOTIO({ composition, options: { fps: 24, kind: 'Audio' } });

    expect(timeline.tracks.children[0]).toMatchObject({ kind: 'Audio', name: 'A1' });
    expect(timeline.name).toBe('Supercut');
  });

  it('serialises the timeline as JSON', () => {
    const result = exportCompositionToOTIO({ composition, options: { fps: 24 } });

    expect(JSON.parse(result.otioJson)).toEqual(result.timeline);
  });
});
