import { createSearchEngine, type EmbeddingProvider, type Logger, type SkippedFile, type TranscriptStore } from '@transcut/core';

export interface IndexCommandOptions {
  files: string[];
  embeddings: EmbeddingProvider;
  force?: boolean;
  preferredExt?: string;
  store?: TranscriptStore;
  logger?: Partial<Logger>;
}

export interface IndexCommandResult {
  indexed: string[];
  skipped: SkippedFile[];
}

/** Writes `<media>.embeddings.bin` beside every file that has a transcript. */
export async function runIndex(options: IndexCommandOptions): Promise<IndexCommandResult> {
  const engine = createSearchEngine({ store: options.store, embeddings: options.embeddings, logger: options.logger });
  const skipped = await engine.index(options.files, { force: options.force, preferredExt: options.preferredExt });
  const skippedFiles = new Set(skipped.map((entry) => entry.file));
  return { indexed: options.files.filter((file) => !skippedFiles.has(file)), skipped };
}
