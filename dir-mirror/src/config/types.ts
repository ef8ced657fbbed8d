/**
 * Configuration types for dir-mirror
 */

export interface MirrorConfig {
  /** Fingerprint cache file, relative to the invocation directory */
  cacheFile: string;

  /** Log file (append mode); null disables file logging */
  logFile: string | null;

  /** Load and persist the fingerprint cache */
  useCache: boolean;

  /** Read size in bytes when hashing */
  chunkSize: number;

  /** Allowed modification-time drift in seconds */
  mtimeToleranceSeconds: number;

  /** Names to exclude on top of the platform defaults (e.g. ["Thumbs.db"]) */
  extraExclusions: string[];
}
