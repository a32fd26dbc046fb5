/* eslint-env node */
import process from 'node:process';
import { readFile } from 'node:fs/promises';
import os from 'node:os';
import { resolve } from 'node:path';
import { Ajv, type ValidateFunction } from 'ajv';

export interface CliConfig {
  search?: {
    searchType?: string;
    exactMatch?: boolean;
    padding?: number;
    resync?: number;
    threshold?: number;
    preferredExt?: string;
  };
  export?: {
    batchSize?: number;
    writeVtt?: boolean;
  };
  ngrams?: {
    /** Replaces the bundled stopword list. */
    ignoredWords?: string[];
  };
}

const CLI_CONFIG_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  properties: {
    search: {
      type: 'object',
      additionalProperties: false,
      properties: {
        searchType: { type: 'string', enum: ['sentence', 'fragment', 'mash', 'semantic'] },
        exactMatch: { type: 'boolean' },
        padding: { type: 'number', minimum: 0 },
        resync: { type: 'number' },
        threshold: { type: 'number', minimum: 0, maximum: 1 },
        preferredExt: { type: 'string' },
      },
    },
    export: {
      type: 'object',
      additionalProperties: false,
      properties: {
        batchSize: { type: 'integer', minimum: 1 },
        writeVtt: { type: 'boolean' },
      },
    },
    ngrams: {
      type: 'object',
      additionalProperties: false,
      properties: {
        ignoredWords: { type: 'array', items: { type: 'string' } },
      },
    },
  },
} as const;

const ajv = new Ajv({ allErrors: true, strict: false });
let validator: ValidateFunction<CliConfig> | undefined;

export function getDefaultCliConfigPath(): string {
  const envPath = process.env.TRANSCUT_CONFIG;
  if (envPath) {
    return resolve(envPath);
  }
  return resolve(os.homedir(), '.config', 'transcut', 'config.json');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads the optional CLI config file. A missing file yields `null`; a file
 * that is not valid JSON or does not match the schema throws.
 */
export async function readCliConfig(configPath?: string): Promise<CliConfig | null> {
  const targetPath = resolve(configPath ?? getDefaultCliConfigPath());
  let contents: string;
  try {
    contents = await readFile(targetPath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(contents);
  validator ??= ajv.compile<CliConfig>(CLI_CONFIG_SCHEMA);
  if (!validator(parsed)) {
    const messages = (validator.errors ?? []).map((error) => `${error.instancePath || '/'} ${error.message ?? ''}`.trim());
    throw new Error(`Invalid CLI config at ${targetPath}: ${messages.join('; ')}`);
  }
  return parsed;
}
