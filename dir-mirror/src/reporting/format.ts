import type { RunStatistics } from '../sync/types.js';

const BAR_LENGTH = 40;
const MAX_NAME_LENGTH = 50;

/**
 * Format bytes into human readable units (1024-based, one decimal)
 */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  for (const unit of units) {
    if (value < 1024) {
      return `${value.toFixed(1)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)} PB`;
}

/**
 * Format duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(2)}s`;
  return `${(ms / 60000).toFixed(2)}m`;
}

export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

/**
 * Shorten a name to the progress line budget, keeping its tail
 */
export function truncateName(name: string): string {
  if (name.length <= MAX_NAME_LENGTH) {
    return name;
  }
  return `...${name.slice(-(MAX_NAME_LENGTH - 3))}`;
}

/**
 * Single progress line, e.g. `[####----] 50.0% (1/2) - a.txt`
 */
export function renderProgressLine(processed: number, total: number, currentName: string = ''): string {
  const progress = total === 0 ? 0 : Math.min(processed / total, 1);
  const filled = Math.floor(BAR_LENGTH * progress);
  const bar = '#'.repeat(filled) + '-'.repeat(BAR_LENGTH - filled);

  let line = `[${bar}] ${(progress * 100).toFixed(1)}% (${processed}/${total})`;
  if (currentName) {
    line += ` - ${truncateName(currentName)}`;
  }
  return line;
}

export interface SummaryContext {
  source: string;
  destination: string;
  dryRun: boolean;
  durationMs: number;
}

/**
 * Plain-text end-of-run summary, one entry per line
 */
export function formatSummaryLines(stats: RunStatistics, context: SummaryContext): string[] {
  return [
    `Source:              ${context.source}`,
    `Destination:         ${context.destination}`,
    `Duration:            ${formatDuration(context.durationMs)}`,
    `Dry run:             ${context.dryRun}`,
    '-'.repeat(60),
    `Files checked:       ${formatCount(stats.filesChecked)}`,
    `Files copied:        ${formatCount(stats.filesCopied)}`,
    `Files skipped:       ${formatCount(stats.filesSkipped)}`,
    `Files excluded:      ${formatCount(stats.filesExcluded)}`,
    `Directories created: ${formatCount(stats.directoriesCreated)}`,
    `Bytes copied:        ${formatCount(stats.bytesCopied)} (${formatBytes(stats.bytesCopied)})`,
    `Errors:              ${formatCount(stats.errors)}`,
  ];
}
