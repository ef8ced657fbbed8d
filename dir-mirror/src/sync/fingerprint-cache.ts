import fs from 'node:fs/promises';
import path from 'node:path';
import type { CacheEntry, FileRecord } from './types.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from './errors.js';

export const CACHE_FORMAT_VERSION = 1;
export const DEFAULT_MTIME_TOLERANCE_SECONDS = 1.0;

/**
 * On-disk layout of the cache file
 */
interface CacheFile {
  version: number;
  entries: Record<string, CacheEntry>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCacheEntry(value: unknown): value is CacheEntry {
  if (!isRecord(value)) {
    return false;
  }
  return (
    typeof value.size === 'number' &&
    Number.isInteger(value.size) &&
    value.size >= 0 &&
    typeof value.modifiedTime === 'number' &&
    Number.isFinite(value.modifiedTime) &&
    typeof value.contentHash === 'string'
  );
}

/**
 * Persistent map from resolved file path to its last computed fingerprint.
 *
 * Entries are evidence for a path only while the live file still has the same
 * size and a modification time within the tolerance window. Stale entries are
 * never removed, only ignored and eventually overwritten.
 */
export class FingerprintCache {
  private readonly entries: Map<string, CacheEntry>;

  constructor(
    private readonly cacheFile: string | null,
    entries: Iterable<[string, CacheEntry]> = [],
    private readonly toleranceSeconds: number = DEFAULT_MTIME_TOLERANCE_SECONDS
  ) {
    this.entries = new Map(entries);
  }

  /**
   * Loads the cache file. A missing, unreadable or malformed file yields an
   * empty cache; entries that fail validation are dropped individually.
   */
  static async load(
    cacheFile: string,
    toleranceSeconds: number = DEFAULT_MTIME_TOLERANCE_SECONDS
  ): Promise<FingerprintCache> {
    const resolved = path.resolve(cacheFile);
    let content: string;

    try {
      content = await fs.readFile(resolved, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        logger.debug(`No cache file at ${resolved}, starting empty`);
      } else {
        logger.warn(`Cannot read cache file ${resolved}: ${errorMessage(error)}`);
      }
      return new FingerprintCache(resolved, [], toleranceSeconds);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      logger.warn(`Ignoring corrupt cache file ${resolved}: ${errorMessage(error)}`);
      return new FingerprintCache(resolved, [], toleranceSeconds);
    }

    if (!isRecord(parsed) || parsed.version !== CACHE_FORMAT_VERSION || !isRecord(parsed.entries)) {
      logger.warn(`Ignoring cache file with unexpected layout: ${resolved}`);
      return new FingerprintCache(resolved, [], toleranceSeconds);
    }

    const entries: Array<[string, CacheEntry]> = [];
    let dropped = 0;
    for (const [key, value] of Object.entries(parsed.entries)) {
      if (isCacheEntry(value)) {
        entries.push([key, { size: value.size, modifiedTime: value.modifiedTime, contentHash: value.contentHash }]);
      } else {
        dropped++;
      }
    }

    if (dropped > 0) {
      logger.debug(`Dropped ${dropped} malformed cache entries`);
    }
    logger.debug(`Loaded ${entries.length} cache entries from ${resolved}`);

    return new FingerprintCache(resolved, entries, toleranceSeconds);
  }

  /**
   * Resolves a path to its cache key: absolute and symlink-free
   */
  static async resolveKey(filePath: string): Promise<string> {
    try {
      return await fs.realpath(filePath);
    } catch {
      return path.resolve(filePath);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Raw entry, valid or not. For inspection only: sync decisions must go
   * through lookupValid, which checks the entry against the file on disk.
   */
  get(key: string): CacheEntry | undefined {
    return this.entries.get(key);
  }

  /**
   * Returns the entry only if it still describes the file on disk
   */
  lookupValid(key: string, currentSize: number, currentModifiedTime: number): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.size !== currentSize) {
      return undefined;
    }
    if (Math.abs(entry.modifiedTime - currentModifiedTime) > this.toleranceSeconds) {
      return undefined;
    }
    return entry;
  }

  update(key: string, record: Pick<FileRecord, 'size' | 'modifiedTime' | 'contentHash'>): void {
    this.entries.set(key, {
      size: record.size,
      modifiedTime: record.modifiedTime,
      contentHash: record.contentHash,
    });
  }

  /**
   * Writes the whole map back to disk. Never throws: a cache that cannot be
   * saved only costs rehashing on the next run.
   */
  async persist(): Promise<boolean> {
    if (this.cacheFile === null) {
      return false;
    }

    const data: CacheFile = {
      version: CACHE_FORMAT_VERSION,
      entries: Object.fromEntries(this.entries),
    };
    const tempFile = `${this.cacheFile}.${process.pid}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.cacheFile), { recursive: true });
      await fs.writeFile(tempFile, JSON.stringify(data, null, 2), 'utf-8');
      await fs.rename(tempFile, this.cacheFile);
      logger.debug(`Saved ${this.entries.size} cache entries to ${this.cacheFile}`);
      return true;
    } catch (error) {
      logger.warn(`Failed to save cache file ${this.cacheFile}: ${errorMessage(error)}`);
      await fs.rm(tempFile, { force: true }).catch((cleanupError: unknown) => {
        logger.debug(`Could not remove ${tempFile}: ${errorMessage(cleanupError)}`);
      });
      return false;
    }
  }
}
