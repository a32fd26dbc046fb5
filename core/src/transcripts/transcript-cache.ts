import type { Segment } from '../types.js';

interface CacheEntry {
  segments: Segment[];
  mtimeMs: number;
}

/**
 * Parsed transcripts keyed by transcript path. An entry is only served while
 * the file's modification time is unchanged.
 */
export class TranscriptCache {
  private readonly entries = new Map<string, CacheEntry>();

  get(transcriptPath: string, mtimeMs: number): Segment[] | undefined {
    const entry = this.entries.get(transcriptPath);
    if (!entry || entry.mtimeMs !== mtimeMs) {
      return undefined;
    }
    return entry.segments;
  }

  set(transcriptPath: string, mtimeMs: number, segments: Segment[]): void {
    this.entries.set(transcriptPath, { segments, mtimeMs });
  }

  delete(transcriptPath: string): boolean {
    return this.entries.delete(transcriptPath);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
