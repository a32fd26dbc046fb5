import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { existsSync, readFileSync } from 'node:fs';
import {
  BATCH_SIZE,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_SEMANTIC_THRESHOLD,
} from './config.js';

export interface EnvLoaderOptions {
  verbose?: boolean;
}

export interface EnvLoaderResult {
  loaded: string[];
}

function declaresWorkspaces(packageJsonPath: string): boolean {
  if (!existsSync(packageJsonPath)) {
    return false;
  }
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    return typeof parsed === 'object' && parsed !== null && 'workspaces' in parsed;
  } catch {
    // An unreadable manifest is not a workspace root; keep walking up.
    return false;
  }
}

function findWorkspaceRoot(startDir: string): string | null {
  let current = startDir;
  const root = resolve('/');
  while (current !== root) {
    if (declaresWorkspaces(resolve(current, 'package.json'))) {
      return current;
    }
    current = dirname(current);
  }
  return null;
}

/**
 * Load environment variables from .env files.
 *
 * Searches for .env files in the following order (first file found takes priority):
 * 1. Workspace root (the nearest package.json declaring `workspaces`)
 * 2. Current working directory (as fallback)
 *
 * @param callerUrl - The import.meta.url of the calling module
 */
export function loadEnv(callerUrl: string, options: EnvLoaderOptions = {}): EnvLoaderResult {
  const callerDir = dirname(fileURLToPath(callerUrl));
  const workspaceRoot = findWorkspaceRoot(callerDir);
  const loaded: string[] = [];

  if (workspaceRoot) {
    const rootEnvPath = resolve(workspaceRoot, '.env');
    if (existsSync(rootEnvPath)) {
      const result = dotenvConfig({ path: rootEnvPath });
      if (result.parsed) {
        loaded.push(rootEnvPath);
        if (options.verbose) {
          console.log(`[env] Loaded: ${rootEnvPath}`);
        }
      }
    }
  }

  // Fallback never overrides values already loaded from the workspace root
  const cwdEnvPath = resolve(process.cwd(), '.env');
  if (!loaded.includes(cwdEnvPath) && existsSync(cwdEnvPath)) {
    const result = dotenvConfig({ path: cwdEnvPath, override: false });
    if (result.parsed) {
      loaded.push(cwdEnvPath);
      if (options.verbose) {
        console.log(`[env] Loaded (fallback): ${cwdEnvPath}`);
      }
    }
  }

  return { loaded };
}

export interface EngineConfig {
  batchSize: number;
  semanticThreshold: number;
  embeddingModel: string;
  ffmpegPath: string;
  ffprobePath: string;
  openAiApiKey?: string;
}

type EnvSource = Record<string, string | undefined>;

/**
 * Resolves tunable engine settings from environment variables.
 * Invalid numeric values throw so misconfiguration surfaces early.
 */
export function resolveEngineConfig(env: EnvSource = process.env): EngineConfig {
  return {
    batchSize: readPositiveInteger(env, 'TRANSCUT_BATCH_SIZE', BATCH_SIZE),
    semanticThreshold: readUnitInterval(env, 'TRANSCUT_SEMANTIC_THRESHOLD', DEFAULT_SEMANTIC_THRESHOLD),
    embeddingModel: env.TRANSCUT_EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODEL,
    ffmpegPath: env.TRANSCUT_FFMPEG_PATH || 'ffmpeg',
    ffprobePath: env.TRANSCUT_FFPROBE_PATH || 'ffprobe',
    openAiApiKey: env.OPENAI_API_KEY || undefined,
  };
}

function readPositiveInteger(env: EnvSource, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${key} must be a positive integer (received "${raw}").`);
  }
  return value;
}

function readUnitInterval(env: EnvSource, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`${key} must be a number between 0 and 1 (received "${raw}").`);
  }
  return value;
}
