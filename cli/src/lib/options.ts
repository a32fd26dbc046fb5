import type { EngineConfig, LogLevel } from '@transcut/core';
import type { CliConfig } from './cli-config.js';

export type CliLogLevel = Extract<LogLevel, 'warn' | 'info' | 'debug'>;

export function resolveLogLevel(levelFlag: string | undefined): CliLogLevel {
  if (levelFlag === undefined || levelFlag === 'warn') {
    return 'warn';
  }
  if (levelFlag === 'info' || levelFlag === 'debug') {
    return levelFlag;
  }
  throw new Error('Invalid log level. Use "warn", "info" or "debug".');
}

export interface SearchFlags {
  query?: string[];
  searchType?: string;
  exactMatch?: boolean;
  threshold?: number;
  padding?: number;
  resync?: number;
  maxClips?: number;
  randomize?: boolean;
  seed?: number;
  prefer?: string;
  force?: boolean;
}

export interface SearchSettings {
  files: string[];
  queries: string[];
  searchType: string;
  exactMatch: boolean;
  threshold: number;
  padding?: number;
  resync: number;
  maxClips?: number;
  randomize: boolean;
  seed?: number;
  preferredExt?: string;
  forceReindex: boolean;
}

/** Flags win over the config file, which wins over engine defaults. */
export function resolveSearchSettings(
  files: string[],
  flags: SearchFlags,
  config: CliConfig | null,
  engine: EngineConfig,
): SearchSettings {
  const defaults = config?.search ?? {};
  return {
    files,
    queries: flags.query ?? [],
    searchType: flags.searchType ?? defaults.searchType ?? 'sentence',
    exactMatch: flags.exactMatch ?? defaults.exactMatch ?? false,
    threshold: flags.threshold ?? defaults.threshold ?? engine.semanticThreshold,
    padding: flags.padding ?? defaults.padding,
    resync: flags.resync ?? defaults.resync ?? 0,
    maxClips: flags.maxClips,
    randomize: flags.randomize ?? false,
    seed: flags.seed,
    preferredExt: flags.prefer ?? defaults.preferredExt,
    forceReindex: flags.force ?? false,
  };
}
