import type { FileRecord } from './types.js';
import { DEFAULT_MTIME_TOLERANCE_SECONDS } from './fingerprint-cache.js';

/**
 * Decides whether the destination needs the source file copied over it.
 *
 * Precedence:
 * 1. no destination record: differs
 * 2. both hashes available: differs iff the hashes differ
 * 3. otherwise size, then modification time beyond the tolerance
 *
 * @param source - Record for the source file
 * @param destination - Record for the destination file, undefined if absent
 * @param toleranceSeconds - Allowed modification-time drift for rule 3
 */
export function filesDiffer(
  source: FileRecord,
  destination: FileRecord | undefined,
  toleranceSeconds: number = DEFAULT_MTIME_TOLERANCE_SECONDS
): boolean {
  if (!destination) {
    return true;
  }

  if (source.contentHash !== '' && destination.contentHash !== '') {
    return source.contentHash !== destination.contentHash;
  }

  if (source.size !== destination.size) {
    return true;
  }

  return Math.abs(source.modifiedTime - destination.modifiedTime) > toleranceSeconds;
}
