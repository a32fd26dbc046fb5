import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export interface TalkFixture {
  dir: string;
  /** `talk.mp4` with a three-segment `talk.json` beside it. */
  talk: string;
  cleanup(): Promise<void>;
}

export async function createTalkFixture(): Promise<TalkFixture> {
  const dir = await mkdtemp(join(tmpdir(), 'transcut-cli-test-'));
  const talk = join(dir, 'talk.mp4');
  await writeFile(talk, 'media');
  await writeFile(
    join(dir, 'talk.json'),
    JSON.stringify([
      { content: 'hello world', start: 1, end: 2 },
      { content: 'the dog and the cat', start: 3, end: 4 },
      { content: 'goodbye world', start: 5, end: 6.5 },
    ]),
    'utf8',
  );
  return {
    dir,
    talk,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}
