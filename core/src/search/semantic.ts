import type { Match, Segment } from '../types.js';

/**
 * Cosine similarity of two equal-length vectors; 0 when either is all zeros.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dot / denominator;
}

export interface EmbeddedSegment {
  /** Media file the segment was searched for. */
  file: string;
  segment: Segment;
  vector: number[];
}

/**
 * Scores every segment against every query and keeps those at or above the
 * threshold, best first. Ties keep query, then file, then segment order.
 */
export function rankBySimilarity(
  queryVectors: readonly number[][],
  candidates: readonly EmbeddedSegment[],
  threshold: number,
): Match[] {
  const matches: Match[] = [];
  for (const queryVector of queryVectors) {
    for (const { file, segment, vector } of candidates) {
      const score = cosineSimilarity(queryVector, vector);
      if (score >= threshold) {
        matches.push({
          file,
          start: segment.start,
          end: segment.end,
          content: segment.content,
          score,
        });
      }
    }
  }
  return matches.sort((a, b) => (b.score ?? 0) - (a.score ?? 0));
}
