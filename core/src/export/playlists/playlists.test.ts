import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { renderM3u } from './m3u.js';
import { renderMpvEdl } from './mpv-edl.js';
import { renderCompositionVtt } from './vtt-writer.js';

const composition = [
  { file: 'clips/a.mp4', start: 1.5, end: 3, content: 'first' },
  { file: '/abs/b.mp4', start: 10, end: 12.25, content: 'second' },
];

describe('renderM3u', () => {
  it('writes start and stop options per clip', () => {
    expect(renderM3u(composition)).toBe(
      [
        '#EXTM3U',
        '#EXTINF:',
        '#EXTVLCOPT:start-time=1.5',
        '#EXTVLCOPT:stop-time=3',
        'clips/a.mp4',
        '#EXTINF:',
        '#EXTVLCOPT:start-time=10',
        '#EXTVLCOPT:stop-time=12.25',
        '/abs/b.mp4',
      ].join('\n'),
    );
  });

  it('writes only the header for an empty composition', () => {
    expect(renderM3u([])).toBe('#EXTM3U');
  });
});

describe('renderMpvEdl', () => {
  it('uses absolute paths and durations', () => {
    expect(renderMpvEdl(composition)).toBe(
      ['# mpv EDL v0', `${resolve('clips/a.mp4')},1.5,1.5`, '/abs/b.mp4,10,2.25'].join('\n'),
    );
  });
});

describe('renderCompositionVtt', () => {
  it('lays cues out back to back on the output timeline', () => {
    expect(renderCompositionVtt(composition)).toBe(
      'WEBVTT\n' +
        '\n0\n00:00:00.000 --> 00:00:01.500\nfirst\n' +
        '\n1\n00:00:01.500 --> 00:00:03.750\nsecond\n',
    );
  });
});
