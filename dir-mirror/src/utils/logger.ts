import { appendFileSync } from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LineLevel = LogLevel | 'success';

/** Logger configuration */
interface LoggerConfig {
  debugEnabled: boolean;
  logFile: string | null;
}

const LONE_SURROGATES = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;
const REPLACEMENT_CHAR = '\uFFFD';

/**
 * True when a path can be written to a UTF-8 stream as-is. Names read from
 * disks with a foreign encoding show up with lone surrogates or U+FFFD.
 */
export function isRenderable(value: string): boolean {
  return !value.includes(REPLACEMENT_CHAR) && value.match(LONE_SURROGATES) === null;
}

/**
 * Renders a path for a log line, falling back to the file name alone
 */
export function renderPath(filePath: string): string {
  if (isRenderable(filePath)) {
    return filePath;
  }
  const name = path.basename(filePath);
  const safeName = name.replace(LONE_SURROGATES, '?').replaceAll(REPLACEMENT_CHAR, '?');
  return `${safeName} (unrenderable path)`;
}

function formatLine(level: LineLevel, message: string): string {
  return `${new Date().toISOString()} - ${level.toUpperCase()} - ${message}`;
}

class Logger {
  private config: LoggerConfig = {
    debugEnabled: false,
    logFile: null,
  };

  /** Enable or disable debug logging */
  setDebug(enabled: boolean): void {
    this.config.debugEnabled = enabled;
  }

  isDebugEnabled(): boolean {
    return this.config.debugEnabled;
  }

  /**
   * Duplicate every log line (uncolored) to a file, opened in append mode.
   * Pass null to detach.
   */
  attachFile(logFile: string | null): void {
    this.config.logFile = logFile === null ? null : path.resolve(logFile);
  }

  getLogFile(): string | null {
    return this.config.logFile;
  }

  debug(message: string): void {
    if (this.config.debugEnabled) {
      this.write('debug', message, chalk.gray, 'log');
    }
  }

  info(message: string): void {
    this.write('info', message, chalk.blue, 'log');
  }

  warn(message: string): void {
    this.write('warn', message, chalk.yellow, 'warn');
  }

  error(message: string): void {
    this.write('error', message, chalk.red, 'error');
  }

  success(message: string): void {
    this.write('success', message, chalk.green, 'log');
  }

  /**
   * Log `message: path` at the given level, with the path made safe for output
   */
  path(level: LogLevel, message: string, filePath: string): void {
    this[level](`${message}: ${renderPath(filePath)}`);
  }

  private write(
    level: LineLevel,
    message: string,
    color: (text: string) => string,
    stream: 'log' | 'warn' | 'error'
  ): void {
    const line = formatLine(level, message);
    console[stream](color(line));

    const logFile = this.config.logFile;
    if (logFile === null) {
      return;
    }
    try {
      appendFileSync(logFile, line + '\n', 'utf-8');
    } catch (error) {
      // Stop writing to a file that refuses appends; console output goes on
      this.config.logFile = null;
      console.error(
        chalk.red(formatLine('error', `Cannot write log file ${logFile}: ${error instanceof Error ? error.message : String(error)}`))
      );
    }
  }
}

/** Global logger instance */
export const logger = new Logger();
