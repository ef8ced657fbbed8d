import path from 'node:path';
import { loadConfig } from './config/config.js';
import type { ConfigLocations } from './config/config.js';
import type { MirrorConfig } from './config/types.js';
import { DirectorySynchronizer, FingerprintCache } from './sync/index.js';
import type { SyncReporter, SyncResult } from './sync/index.js';
import { ConsoleReporter } from './reporting/console-reporter.js';
import { logger } from './utils/logger.js';

export const VERSION = '1.0.0';

export interface MirrorOptions {
  source: string;
  destination: string;
  dryRun?: boolean;
  verbose?: boolean;
  configPath?: string;
  cacheFileOverride?: string;
  logFileOverride?: string;
  ignoreCache?: boolean;
  /** Aborting stops the run before the next file */
  signal?: AbortSignal;
  /** Replaces the console reporter */
  reporter?: SyncReporter;
  /** Where implicit config files are searched */
  configLocations?: ConfigLocations;
}

/**
 * Resolve the effective configuration: files first, then command-line overrides
 */
export async function resolveMirrorConfig(options: MirrorOptions): Promise<MirrorConfig> {
  const config = await loadConfig(options.configPath, options.configLocations);

  if (options.cacheFileOverride) {
    config.cacheFile = options.cacheFileOverride;
  }
  if (options.logFileOverride) {
    config.logFile = options.logFileOverride;
  }
  if (options.ignoreCache) {
    config.useCache = false;
  }

  return config;
}

/**
 * Main entry point: mirror source into destination
 */
export async function mirrorDirectories(options: MirrorOptions): Promise<SyncResult> {
  if (options.verbose) {
    logger.setDebug(true);
  }

  const config = await resolveMirrorConfig(options);
  logger.attachFile(config.logFile);

  const cache = config.useCache
    ? await FingerprintCache.load(config.cacheFile, config.mtimeToleranceSeconds)
    : new FingerprintCache(null, [], config.mtimeToleranceSeconds);
  if (config.useCache) {
    logger.debug(`Using cache file: ${path.resolve(config.cacheFile)} (${cache.size} entries)`);
  }

  const dryRun = options.dryRun ?? false;
  const reporter =
    options.reporter ??
    new ConsoleReporter({
      source: path.resolve(options.source),
      destination: path.resolve(options.destination),
      dryRun,
      showProgress: !options.verbose,
      logFile: logger.getLogFile(),
    });

  const synchronizer = new DirectorySynchronizer(
    {
      source: options.source,
      destination: options.destination,
      dryRun,
      extraExclusions: config.extraExclusions,
      chunkSize: config.chunkSize,
      mtimeToleranceSeconds: config.mtimeToleranceSeconds,
    },
    cache,
    reporter
  );

  return synchronizer.run(options.signal);
}
