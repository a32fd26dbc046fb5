#!/usr/bin/env tsx
/* eslint-env node */
import process from 'node:process';
import meow from 'meow';
import chalk from 'chalk';
import {
  DEFAULT_OUTPUT_FILE,
  formatError,
  isTranscutError,
  loadEnv,
  resolveEngineConfig,
  withLogLevel,
  type EmbeddingProvider,
  type EngineConfig,
  type Logger,
} from '@transcut/core';
import { createAiEmbeddingProvider, createFfmpegRenderer, probeDurations } from '@transcut/providers';
import { runExportCommand } from './commands/export.js';
import { runIndex } from './commands/index-embeddings.js';
import { runNgrams } from './commands/ngrams.js';
import { runSearch } from './commands/search.js';
import { readCliConfig } from './lib/cli-config.js';
import { resolveLogLevel, resolveSearchSettings } from './lib/options.js';
import {
  formatMatchLine,
  formatNgramLine,
  formatSkippedLines,
  formatSummaryLines,
} from './lib/output.js';

loadEnv(import.meta.url);

const cli = meow(
  `\nUsage\n  $ transcut <command> <files...> [options]\n\nCommands\n  search      Print the composition a search produces\n  export      Render a supercut, clips, a playlist or an OTIO timeline\n  ngrams      List the most common n-grams\n  index       Build semantic embedding caches\n\nSearch options\n  --query, -q        Query (repeatable)\n  --search-type, -s  sentence | fragment | mash | semantic (default: sentence)\n  --exact-match      Match whole words only\n  --threshold        Minimum similarity for semantic search (default: 0.45)\n  --padding          Seconds added around each clip\n  --resync           Seconds every clip is shifted by\n  --max-clips        Keep at most this many clips\n  --randomize        Shuffle the clips\n  --seed             Seed for shuffling and mash picks\n  --prefer           Preferred transcript extension, e.g. .srt\n\nExport options\n  --output, -o       Output file (default: supercut.mp4)\n  --export-clips     Write every clip to its own file\n  --write-vtt        Also write subtitles next to the output\n  --batch-size       Clips rendered per batch (default: 20)\n\nOther options\n  --n                N-gram size (default: 1)\n  --no-filter        Keep n-grams containing stopwords\n  --force            Rebuild embedding caches\n  --log-level        warn | info | debug\n\nExamples\n  $ transcut search talk.mp4 --query "hello world"\n  $ transcut search *.mp4 -q "very" -s fragment --padding 0.1\n  $ transcut export talk.mp4 -q "thank you" -o thanks.mp4\n  $ transcut export talk.mp4 -q "climate" -s semantic -o climate.m3u\n  $ transcut ngrams talk.mp4 --n 2\n  $ transcut index talk.mp4 --force\n`,
  {
    importMeta: import.meta,
    booleanDefault: undefined,
    flags: {
      query: { type: 'string', shortFlag: 'q', isMultiple: true },
      searchType: { type: 'string', shortFlag: 's' },
      exactMatch: { type: 'boolean' },
      threshold: { type: 'number' },
      padding: { type: 'number' },
      resync: { type: 'number' },
      maxClips: { type: 'number' },
      randomize: { type: 'boolean' },
      seed: { type: 'number' },
      prefer: { type: 'string' },
      output: { type: 'string', shortFlag: 'o' },
      exportClips: { type: 'boolean' },
      writeVtt: { type: 'boolean' },
      batchSize: { type: 'number' },
      n: { type: 'number' },
      filter: { type: 'boolean', default: true },
      force: { type: 'boolean' },
      logLevel: { type: 'string' },
    },
  },
);

function createEmbeddings(engineConfig: EngineConfig, logger: Partial<Logger>): EmbeddingProvider | undefined {
  if (!engineConfig.openAiApiKey) {
    return undefined;
  }
  return createAiEmbeddingProvider({
    apiKey: engineConfig.openAiApiKey,
    model: engineConfig.embeddingModel,
    logger,
  });
}

async function main(): Promise<void> {
  const [command, ...files] = cli.input;
  const flags = cli.flags;
  const output = globalThis.console;

  if (command === undefined) {
    cli.showHelp(0);
    return;
  }

  const logger = withLogLevel(globalThis.console, resolveLogLevel(flags.logLevel));
  const engineConfig = resolveEngineConfig();
  const cliConfig = await readCliConfig();

  if (files.length === 0) {
    output.error(`Error: ${command} needs at least one media file.`);
    process.exitCode = 1;
    return;
  }

  switch (command) {
    case 'search': {
      const settings = resolveSearchSettings(files, flags, cliConfig, engineConfig);
      const { composition, skipped } = await runSearch({
        ...settings,
        embeddings: settings.searchType.toLowerCase() === 'semantic' ? createEmbeddings(engineConfig, logger) : undefined,
        logger,
      });
      for (const line of formatSkippedLines(skipped)) {
        output.error(line);
      }
      if (composition.length === 0) {
        output.info(chalk.yellow('No results found.'));
        return;
      }
      for (const clip of composition) {
        output.info(formatMatchLine(clip));
      }
      return;
    }
    case 'export': {
      const settings = resolveSearchSettings(files, flags, cliConfig, engineConfig);
      const controller = new AbortController();
      const onSigint = (): void => controller.abort();
      process.once('SIGINT', onSigint);
      let lastPercent = -1;
      try {
        const result = await runExportCommand({
          ...settings,
          embeddings: settings.searchType.toLowerCase() === 'semantic' ? createEmbeddings(engineConfig, logger) : undefined,
          outputPath: flags.output ?? DEFAULT_OUTPUT_FILE,
          exportClips: flags.exportClips ?? false,
          writeVtt: flags.writeVtt ?? cliConfig?.export?.writeVtt ?? false,
          batchSize: flags.batchSize ?? cliConfig?.export?.batchSize ?? engineConfig.batchSize,
          renderer: createFfmpegRenderer({ ffmpegPath: engineConfig.ffmpegPath, logger }),
          probeDurations: (sources) => probeDurations(sources, { ffprobePath: engineConfig.ffprobePath, logger }),
          onProgress: (event) => {
            const percent = Math.floor(event.fraction * 100);
            if (percent !== lastPercent) {
              lastPercent = percent;
              process.stderr.write(`\r${chalk.dim(`Exporting ${percent}%`)}`);
            }
          },
          signal: controller.signal,
          logger,
        });
        if (lastPercent >= 0) {
          process.stderr.write('\n');
        }
        for (const line of formatSkippedLines(result.skipped)) {
          output.error(line);
        }
        if (!result.export) {
          output.info(chalk.yellow('No results found.'));
          return;
        }
        output.info(chalk.green(`Exported ${result.export.mode} to ${result.export.outputPath}`));
        if (result.export.mode === 'supercut' && result.export.report.failed.length > 0) {
          const { report } = result.export;
          output.info(chalk.yellow(`${report.failed.length} of ${report.totalBatches} batches failed and were skipped.`));
        }
        if (result.export.mode === 'clips' && result.export.summary.failed.length > 0) {
          output.info(chalk.yellow(`${result.export.summary.failed.length} clips failed to render.`));
        }
        if (result.export.vttPath) {
          output.info(`Subtitles: ${result.export.vttPath}`);
        }
        for (const line of formatSummaryLines(result.summary)) {
          output.info(line);
        }
      } finally {
        process.off('SIGINT', onSigint);
      }
      return;
    }
    case 'ngrams': {
      const counts = await runNgrams({
        files,
        n: flags.n ?? 1,
        filter: flags.filter,
        ignoredWords: cliConfig?.ngrams?.ignoredWords,
        preferredExt: flags.prefer ?? cliConfig?.search?.preferredExt,
        logger,
      });
      for (const count of counts) {
        output.info(formatNgramLine(count));
      }
      return;
    }
    case 'index': {
      const embeddings = createEmbeddings(engineConfig, logger);
      if (!embeddings) {
        output.error('Error: OPENAI_API_KEY is required to build embedding caches.');
        process.exitCode = 1;
        return;
      }
      const result = await runIndex({
        files,
        embeddings,
        force: flags.force ?? false,
        preferredExt: flags.prefer ?? cliConfig?.search?.preferredExt,
        logger,
      });
      for (const line of formatSkippedLines(result.skipped)) {
        output.error(line);
      }
      output.info(chalk.green(`Indexed ${result.indexed.length} of ${files.length} files.`));
      return;
    }
    default: {
      output.error(`Error: unknown command "${command}".`);
      cli.showHelp(1);
    }
  }
}

main().catch((error: unknown) => {
  const message = isTranscutError(error) ? formatError(error) : error instanceof Error ? error.message : String(error);
  globalThis.console.error(chalk.red(`Error: ${message}`));
  process.exitCode = 1;
});
