import { buildApplication, buildCommand } from '@stricli/core';
import type { CommandContext } from '@stricli/core';
import { mirrorDirectories, VERSION } from './dir-mirror.js';
import { SyncInterruptedError } from './sync/errors.js';
import { logger } from './utils/logger.js';

interface MirrorFlags {
  'dry-run': boolean;
  verbose: boolean;
  config?: string;
  'cache-file'?: string;
  'log-file'?: string;
  'ignore-cache': boolean;
}

const mirrorCommand = buildCommand({
  docs: {
    brief: 'Mirror a source directory into a destination, copying only new or changed files',
  },
  parameters: {
    positional: {
      kind: 'tuple',
      parameters: [
        {
          brief: 'Source directory',
          parse: String,
          placeholder: 'source',
        },
        {
          brief: 'Destination directory (created if missing)',
          parse: String,
          placeholder: 'destination',
        },
      ],
    },
    flags: {
      'dry-run': {
        kind: 'boolean',
        brief: 'Show what would be done without changing the destination',
        default: false,
      },
      verbose: {
        kind: 'boolean',
        brief: 'Log every file and disable the progress bar',
        default: false,
      },
      config: {
        kind: 'parsed',
        brief: 'Path to configuration file',
        parse: String,
        optional: true,
      },
      'cache-file': {
        kind: 'parsed',
        brief: 'Override the fingerprint cache file',
        parse: String,
        optional: true,
      },
      'log-file': {
        kind: 'parsed',
        brief: 'Override the log file',
        parse: String,
        optional: true,
      },
      'ignore-cache': {
        kind: 'boolean',
        brief: 'Neither read nor save the fingerprint cache',
        default: false,
      },
    },
    aliases: {
      n: 'dry-run',
      v: 'verbose',
      c: 'config',
    },
  },
  async func(this: CommandContext, flags: MirrorFlags, source: string, destination: string): Promise<void> {
    const controller = new AbortController();
    const onInterrupt = (): void => {
      logger.warn('Interrupt received, stopping after the current file');
      controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    try {
      await mirrorDirectories({
        source,
        destination,
        dryRun: flags['dry-run'],
        verbose: flags.verbose,
        configPath: flags.config,
        cacheFileOverride: flags['cache-file'],
        logFileOverride: flags['log-file'],
        ignoreCache: flags['ignore-cache'],
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof SyncInterruptedError) {
        console.log('\nOperation cancelled by user.');
      } else {
        logger.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
      }
      process.exitCode = 1;
    } finally {
      process.off('SIGINT', onInterrupt);
    }
  },
});

export const app = buildApplication(mirrorCommand, {
  name: 'dir-mirror',
  versionInfo: {
    currentVersion: VERSION,
  },
});
