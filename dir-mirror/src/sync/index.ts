export { DirectorySynchronizer, silentReporter } from './synchronizer.js';
export { FingerprintCache, CACHE_FORMAT_VERSION, DEFAULT_MTIME_TOLERANCE_SECONDS } from './fingerprint-cache.js';
export { hashFile, DEFAULT_CHUNK_SIZE } from './fingerprint.js';
export { filesDiffer } from './change-detector.js';
export { DEFAULT_EXCLUSIONS, buildExclusionSet, isExcludedName, isExcludedPath } from './exclusions.js';
export { walkSourceTree, countSourceFiles } from './traverser.js';
export type { SourceEntry } from './traverser.js';
export {
  InvalidSourceError,
  InvalidDestinationError,
  SyncInterruptedError,
  ConfigError,
} from './errors.js';
export type {
  FileRecord,
  CacheEntry,
  RunStatistics,
  SyncPhase,
  SyncReporter,
  SyncOptions,
  SyncResult,
} from './types.js';
