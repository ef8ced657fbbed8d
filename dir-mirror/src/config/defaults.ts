import type { MirrorConfig } from './types.js';

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: MirrorConfig = {
  cacheFile: '.dir-mirror-cache.json',
  logFile: 'dir-mirror.log',
  useCache: true,
  chunkSize: 8192,
  mtimeToleranceSeconds: 1.0,
  extraExclusions: [],
};
