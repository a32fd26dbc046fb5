import type { Composition, ExportStrategy } from '../types.js';

export interface RenderOptions {
  signal?: AbortSignal;
  /** Fraction in [0, 1] of the current render. */
  onProgress?: (fraction: number) => void;
}

/**
 * Turns clip lists into media files. Each promise resolves only after the
 * output file has been fully written and closed.
 */
export interface MediaRenderer {
  /** Cuts every clip from its source and joins them into `outputPath`. */
  renderClips(clips: Composition, outputPath: string, strategy: ExportStrategy, options?: RenderOptions): Promise<void>;
  /** Joins already rendered files, in order, into `outputPath`. */
  concatenate(inputs: string[], outputPath: string, strategy: ExportStrategy, options?: RenderOptions): Promise<void>;
}
