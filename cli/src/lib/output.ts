import chalk from 'chalk';
import type { CompositionSummary, Match, NgramCount, SkippedFile } from '@transcut/core';
import { formatError } from '@transcut/core';

/** `<file> | <start> - <end> | <content>` with times to two decimals. */
export function formatMatchLine(match: Match): string {
  return `${match.file} | ${match.start.toFixed(2)} - ${match.end.toFixed(2)} | ${match.content}`;
}

export function formatNgramLine({ ngram, count }: NgramCount): string {
  return `${ngram.join(' ')}\t${count}`;
}

export function formatDuration(valueSeconds: number): string {
  const roundedSeconds = Math.max(0, Math.floor(valueSeconds));
  const hours = Math.floor(roundedSeconds / 3600);
  const minutes = Math.floor((roundedSeconds % 3600) / 60);
  const seconds = roundedSeconds % 60;

  if (hours > 0) {
    return `${hours}:${minutes.toString().padStart(2, '0')}:${seconds.toString().padStart(2, '0')}`;
  }
  return `${minutes}:${seconds.toString().padStart(2, '0')}`;
}

export function formatSummaryLines(summary: CompositionSummary): string[] {
  const bullet = chalk.dim('•');
  const lines = [
    `${bullet} ${chalk.bold('Clips')}: ${summary.clipCount}`,
    `${bullet} ${chalk.bold('Supercut')}: ${formatDuration(summary.compositionDuration)}`,
  ];
  if (summary.originalDuration > 0) {
    lines.push(
      `${bullet} ${chalk.bold('Sources')}: ${formatDuration(summary.originalDuration)}`,
      `${bullet} ${chalk.bold('Time saved')}: ${formatDuration(summary.timeSaved)} (${summary.efficiencyPercent.toFixed(1)}%)`,
    );
  }
  return lines;
}

export function formatSkippedLines(skipped: readonly SkippedFile[]): string[] {
  return skipped.map(({ error }) => chalk.yellow(formatError(error)));
}
