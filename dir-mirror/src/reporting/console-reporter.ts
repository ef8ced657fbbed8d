import path from 'node:path';
import chalk from 'chalk';
import type { RunStatistics, SyncReporter } from '../sync/types.js';
import { renderPath } from '../utils/logger.js';
import { formatCount, formatSummaryLines, renderProgressLine } from './format.js';

export interface ConsoleReporterOptions {
  source: string;
  destination: string;
  dryRun: boolean;
  /** Redraw a progress bar for every file (off in verbose mode) */
  showProgress: boolean;
  /** Named in the warning printed when errors occurred */
  logFile: string | null;
  /** Raw terminal output, defaults to stdout */
  write?: (text: string) => void;
}

/**
 * Terminal rendering of a run: file count, progress bar and summary
 */
export class ConsoleReporter implements SyncReporter {
  private readonly write: (text: string) => void;
  private progressDrawn = false;

  constructor(private readonly options: ConsoleReporterOptions) {
    this.write = options.write ?? ((text: string) => {
      process.stdout.write(text);
    });
  }

  onCountStarted(): void {
    this.write('Counting files...\n');
  }

  onFileCounted(total: number): void {
    this.write(`Found ${formatCount(total)} files to process\n\n`);
  }

  onFileProcessed(currentPath: string, processedCount: number, total: number): void {
    if (!this.options.showProgress || total === 0) {
      return;
    }
    const name = renderPath(path.basename(currentPath));
    this.write(`\r${renderProgressLine(processedCount, total, name)}`);
    this.progressDrawn = true;
  }

  onRunComplete(stats: RunStatistics, durationMs: number): void {
    if (this.progressDrawn) {
      this.write('\n');
      this.progressDrawn = false;
    }

    const lines: string[] = [];
    lines.push('');
    lines.push(chalk.bold.cyan('='.repeat(60)));
    lines.push(chalk.bold.cyan(this.options.dryRun ? 'SYNCHRONIZATION SUMMARY (DRY RUN)' : 'SYNCHRONIZATION SUMMARY'));
    lines.push(chalk.bold.cyan('='.repeat(60)));
    lines.push(
      ...formatSummaryLines(stats, {
        source: renderPath(this.options.source),
        destination: renderPath(this.options.destination),
        dryRun: this.options.dryRun,
        durationMs,
      })
    );
    lines.push(chalk.bold.cyan('='.repeat(60)));

    if (stats.errors > 0) {
      lines.push('');
      lines.push(chalk.yellow(`WARNING: ${stats.errors} errors occurred during synchronization!`));
      lines.push(
        chalk.yellow(
          this.options.logFile
            ? `Check the log file '${this.options.logFile}' for details.`
            : 'Check the log output above for details.'
        )
      );
    }

    this.write(lines.join('\n') + '\n');
  }
}
