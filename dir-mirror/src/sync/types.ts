/**
 * Observable state of one file at a point in time
 */
export interface FileRecord {
  /** Absolute path the record was built for */
  path: string;

  /** Byte length */
  size: number;

  /** Modification time in seconds since the epoch (sub-second precision) */
  modifiedTime: number;

  /** Hex SHA-256 of the content, or '' when the file could not be read */
  contentHash: string;
}

/**
 * Persisted shadow of a FileRecord, keyed by resolved absolute path
 */
export interface CacheEntry {
  size: number;
  modifiedTime: number;
  contentHash: string;
}

/**
 * Counters for a single run
 */
export interface RunStatistics {
  filesChecked: number;
  filesCopied: number;
  filesSkipped: number;
  filesExcluded: number;
  directoriesCreated: number;
  bytesCopied: number;
  errors: number;
}

export type SyncPhase =
  | 'initializing'
  | 'counting'
  | 'syncing'
  | 'finalizing'
  | 'done'
  | 'failed';

/**
 * Observer for progress and end-of-run reporting.
 * The synchronizer never renders anything itself.
 */
export interface SyncReporter {
  /** Called once, before the source tree is walked for the total */
  onCountStarted(): void;

  /** Called once after the counting pass */
  onFileCounted(total: number): void;

  /** Called for every checked file, before it is compared */
  onFileProcessed(currentPath: string, processedCount: number, total: number): void;

  /** Called once the cache has been persisted */
  onRunComplete(stats: RunStatistics, durationMs: number): void;
}

export interface SyncOptions {
  /** Source directory */
  source: string;

  /** Destination directory */
  destination: string;

  /** Report what would happen without touching the destination */
  dryRun?: boolean;

  /** Extra names to exclude, on top of the platform defaults */
  extraExclusions?: string[];

  /** Read size when hashing */
  chunkSize?: number;

  /** Allowed modification-time drift, in seconds */
  mtimeToleranceSeconds?: number;
}

export interface SyncResult {
  source: string;
  destination: string;
  dryRun: boolean;
  stats: RunStatistics;
  durationMs: number;
}

export function createRunStatistics(): RunStatistics {
  return {
    filesChecked: 0,
    filesCopied: 0,
    filesSkipped: 0,
    filesExcluded: 0,
    directoriesCreated: 0,
    bytesCopied: 0,
    errors: 0,
  };
}
