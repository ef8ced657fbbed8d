import fs from 'node:fs/promises';
import { createReadStream, createWriteStream } from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import type {
  FileRecord,
  RunStatistics,
  SyncOptions,
  SyncPhase,
  SyncReporter,
  SyncResult,
} from './types.js';
import { createRunStatistics } from './types.js';
import { FingerprintCache, DEFAULT_MTIME_TOLERANCE_SECONDS } from './fingerprint-cache.js';
import { DEFAULT_CHUNK_SIZE, hashFile } from './fingerprint.js';
import { filesDiffer } from './change-detector.js';
import { buildExclusionSet } from './exclusions.js';
import { countSourceFiles, walkSourceTree } from './traverser.js';
import type { SourceEntry } from './traverser.js';
import {
  InvalidDestinationError,
  InvalidSourceError,
  SyncInterruptedError,
  errorMessage,
} from './errors.js';
import { getFileStats, statOrNull } from '../utils/fs-utils.js';
import { logger, renderPath } from '../utils/logger.js';

/**
 * Reporter that ignores every event
 */
export const silentReporter: SyncReporter = {
  onCountStarted: () => undefined,
  onFileCounted: () => undefined,
  onFileProcessed: () => undefined,
  onRunComplete: () => undefined,
};

/**
 * Everything one run reads and mutates. Built at the start of run() and
 * handed to each step; nothing outlives the run except the cache.
 */
interface RunContext {
  source: string;
  destination: string;
  dryRun: boolean;
  chunkSize: number;
  toleranceSeconds: number;
  exclusions: ReadonlySet<string>;
  cache: FingerprintCache;
  reporter: SyncReporter;
  stats: RunStatistics;
  /** Directories a dry run pretended to create, so later files see them */
  simulatedDirectories: Set<string>;
  total: number;
  processed: number;
  signal?: AbortSignal;
}

/**
 * One-way mirror of a source tree into a destination tree.
 *
 * A run moves through initializing, counting, syncing, finalizing and done.
 * Counting walks the tree once without reading content so progress can be
 * reported against a total; syncing walks it again and copies every file
 * whose fingerprint differs from its destination counterpart.
 */
export class DirectorySynchronizer {
  private phase: SyncPhase = 'initializing';

  constructor(
    private readonly options: SyncOptions,
    private readonly cache: FingerprintCache = new FingerprintCache(null),
    private readonly reporter: SyncReporter = silentReporter
  ) {}

  getPhase(): SyncPhase {
    return this.phase;
  }

  /**
   * Run the synchronization
   * @param signal - Aborting it stops the count walk, or the sync before the next file
   * @throws InvalidSourceError, InvalidDestinationError, SyncInterruptedError
   */
  async run(signal?: AbortSignal): Promise<SyncResult> {
    const startTime = Date.now();
    const context = this.createContext(signal);

    try {
      this.phase = 'initializing';
      logger.info(`Starting sync: ${renderPath(context.source)} -> ${renderPath(context.destination)}`);
      logger.info(`Dry run mode: ${context.dryRun}`);
      await this.initialize(context);

      this.phase = 'counting';
      if (context.signal?.aborted) {
        throw new SyncInterruptedError(0);
      }
      this.reporter.onCountStarted();
      context.total = await countSourceFiles(context.source, context.exclusions, context.signal);
      this.reporter.onFileCounted(context.total);

      this.phase = 'syncing';
      for await (const entry of walkSourceTree(context.source, context.exclusions)) {
        if (context.signal?.aborted) {
          throw new SyncInterruptedError(context.processed);
        }
        await this.processEntry(context, entry);
      }
    } catch (error) {
      this.phase = 'failed';
      if (error instanceof SyncInterruptedError) {
        // Keep whatever was fingerprinted before the interrupt
        await context.cache.persist();
      }
      throw error;
    }

    this.phase = 'finalizing';
    await context.cache.persist();
    const durationMs = Date.now() - startTime;
    const { stats } = context;
    logger.success(
      `Sync finished: ${stats.filesCopied} ${context.dryRun ? 'would be copied' : 'copied'}, ` +
        `${stats.filesSkipped} skipped, ${stats.errors} errors`
    );
    this.reporter.onRunComplete(context.stats, durationMs);
    this.phase = 'done';

    return {
      source: context.source,
      destination: context.destination,
      dryRun: context.dryRun,
      stats: context.stats,
      durationMs,
    };
  }

  private createContext(signal: AbortSignal | undefined): RunContext {
    return {
      source: path.resolve(this.options.source),
      destination: path.resolve(this.options.destination),
      dryRun: this.options.dryRun ?? false,
      chunkSize: this.options.chunkSize ?? DEFAULT_CHUNK_SIZE,
      toleranceSeconds: this.options.mtimeToleranceSeconds ?? DEFAULT_MTIME_TOLERANCE_SECONDS,
      exclusions: buildExclusionSet(this.options.extraExclusions),
      cache: this.cache,
      reporter: this.reporter,
      stats: createRunStatistics(),
      simulatedDirectories: new Set(),
      total: 0,
      processed: 0,
      signal,
    };
  }

  /**
   * Validate the source and make sure the destination root exists
   */
  private async initialize(context: RunContext): Promise<void> {
    const sourceStats = await statOrNull(context.source);
    if (sourceStats === null) {
      throw new InvalidSourceError(context.source, 'missing');
    }
    if (!sourceStats.isDirectory) {
      throw new InvalidSourceError(context.source, 'not-a-directory');
    }

    const destinationStats = await statOrNull(context.destination);
    if (destinationStats !== null) {
      if (!destinationStats.isDirectory) {
        throw new InvalidDestinationError(context.destination);
      }
      return;
    }

    if (context.dryRun) {
      context.simulatedDirectories.add(context.destination);
      logger.info(`Would create destination directory: ${renderPath(context.destination)}`);
    } else {
      await fs.mkdir(context.destination, { recursive: true });
      logger.info(`Created destination directory: ${renderPath(context.destination)}`);
    }
    context.stats.directoriesCreated++;
  }

  private async processEntry(context: RunContext, entry: SourceEntry): Promise<void> {
    const { stats } = context;

    if (entry.kind === 'excluded') {
      stats.filesExcluded++;
      logger.path('debug', 'Excluded (platform metadata)', entry.path);
      return;
    }

    stats.filesChecked++;
    context.processed++;
    this.reporter.onFileProcessed(entry.path, context.processed, context.total);
    logger.path('debug', 'Checking', entry.path);

    const sourceRecord = await buildFileRecord(context, entry.path);
    if (!sourceRecord) {
      return;
    }

    const destinationPath = path.join(context.destination, entry.relativePath);
    const destinationStats = await statOrNull(destinationPath);
    let destinationRecord: FileRecord | undefined;

    if (destinationStats !== null) {
      if (!destinationStats.isFile) {
        logger.path('error', 'Destination exists and is not a file', destinationPath);
        stats.errors++;
        return;
      }
      destinationRecord = await buildFileRecord(context, destinationPath);
    }

    if (filesDiffer(sourceRecord, destinationRecord, context.toleranceSeconds)) {
      await copyFile(context, sourceRecord, destinationPath);
    } else {
      stats.filesSkipped++;
      logger.path('debug', 'Skipped (unchanged)', entry.path);
    }
  }
}

/**
 * Fingerprint a file, reusing the cached hash while size and mtime still match.
 * Returns undefined (and counts an error) when the file cannot be stat'ed.
 */
async function buildFileRecord(context: RunContext, filePath: string): Promise<FileRecord | undefined> {
  let size: number;
  let modifiedTime: number;
  try {
    ({ size, modifiedTime } = await getFileStats(filePath));
  } catch (error) {
    logger.error(`Error getting file info for ${renderPath(filePath)}: ${errorMessage(error)}`);
    context.stats.errors++;
    return undefined;
  }

  const key = await FingerprintCache.resolveKey(filePath);
  const cached = context.cache.lookupValid(key, size, modifiedTime);
  if (cached && cached.contentHash !== '') {
    return { path: filePath, ...cached };
  }

  const contentHash = await hashFile(filePath, context.chunkSize);
  if (contentHash === '') {
    context.stats.errors++;
  } else {
    context.cache.update(key, { size, modifiedTime, contentHash });
  }

  return { path: filePath, size, modifiedTime, contentHash };
}

/**
 * Create a destination directory if it is missing. Counts one creation per
 * call that actually had to create something; a dry run only records it.
 */
async function ensureDirectory(context: RunContext, directory: string): Promise<void> {
  if (context.simulatedDirectories.has(directory)) {
    return;
  }
  const existing = await statOrNull(directory);
  if (existing !== null && existing.isDirectory) {
    return;
  }

  if (context.dryRun) {
    let current = directory;
    while (current.startsWith(context.destination) && !context.simulatedDirectories.has(current)) {
      context.simulatedDirectories.add(current);
      current = path.dirname(current);
    }
    logger.path('debug', 'Would create directory', directory);
  } else {
    await fs.mkdir(directory, { recursive: true });
    logger.path('debug', 'Created directory', directory);
  }
  context.stats.directoriesCreated++;
}

/**
 * Copy content, times and mode from source to destination. The content goes
 * to a sibling temp file first, so the destination is either replaced whole
 * or left as it was. Failures are logged and counted; they never end the run.
 */
async function copyFile(context: RunContext, source: FileRecord, destinationPath: string): Promise<void> {
  const { stats } = context;
  const description = `${source.path} -> ${destinationPath}`;
  const tempPath = `${destinationPath}.${process.pid}.tmp`;

  try {
    await ensureDirectory(context, path.dirname(destinationPath));

    if (context.dryRun) {
      logger.path('info', 'Would copy', description);
    } else {
      const sourceStats = await getFileStats(source.path);
      await pipeline(createReadStream(source.path), createWriteStream(tempPath));
      await fs.utimes(tempPath, sourceStats.accessedTime, sourceStats.modifiedTime);
      await fs.chmod(tempPath, sourceStats.mode & 0o7777);
      await fs.rename(tempPath, destinationPath);
      logger.path('info', 'Copied', description);
    }

    stats.filesCopied++;
    stats.bytesCopied += source.size;
  } catch (error) {
    logger.error(`Error copying ${renderPath(source.path)} to ${renderPath(destinationPath)}: ${errorMessage(error)}`);
    stats.errors++;
    if (!context.dryRun) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        logger.debug(`Could not remove ${renderPath(tempPath)}: ${errorMessage(cleanupError)}`);
      });
    }
    return;
  }

  if (!context.dryRun && source.contentHash !== '') {
    await rememberCopy(context, source, destinationPath);
  }
}

/**
 * The destination now holds the source content; record that so the next run
 * does not have to rehash it.
 */
async function rememberCopy(context: RunContext, source: FileRecord, destinationPath: string): Promise<void> {
  const copied = await statOrNull(destinationPath);
  if (copied === null || copied.size !== source.size) {
    return;
  }
  const key = await FingerprintCache.resolveKey(destinationPath);
  context.cache.update(key, {
    size: copied.size,
    modifiedTime: copied.modifiedTime,
    contentHash: source.contentHash,
  });
}
