import { join, relative } from 'path';
import { isExcludedName, isExcludedPath } from './exclusions.js';
import { SyncInterruptedError } from './errors.js';
import { logger, renderPath } from '../utils/logger.js';
import { readDirSafe, statOrNull } from '../utils/fs-utils.js';

/**
 * One file found under the source root
 */
export interface SourceEntry {
  /** 'excluded' files are reported so they can be counted, never compared */
  kind: 'file' | 'excluded';
  path: string;
  relativePath: string;
}

/**
 * Walk the source tree depth-first in name order and yield its files.
 * Directories whose name is excluded are pruned without being entered.
 * Symlinks to files are yielded; symlinked directories are not followed.
 */
export async function* walkSourceTree(
  root: string,
  exclusions: ReadonlySet<string>,
  currentPath: string = root
): AsyncGenerator<SourceEntry> {
  const entries = await readDirSafe(currentPath);
  if (entries === null) {
    return;
  }

  for (const entry of entries) {
    const fullPath = join(currentPath, entry.name);
    const relativePath = relative(root, fullPath);

    if (entry.isDirectory()) {
      if (isExcludedName(entry.name, exclusions)) {
        logger.debug(`Pruned directory: ${renderPath(fullPath)}`);
        continue;
      }
      yield* walkSourceTree(root, exclusions, fullPath);
      continue;
    }

    let isFile = entry.isFile();
    if (entry.isSymbolicLink()) {
      const target = await statOrNull(fullPath);
      if (target === null || target.isDirectory) {
        logger.debug(`Skipping symlink: ${renderPath(fullPath)}`);
        continue;
      }
      isFile = target.isFile;
    }

    if (!isFile) {
      continue;
    }

    yield {
      kind: isExcludedPath(relativePath, exclusions) ? 'excluded' : 'file',
      path: fullPath,
      relativePath,
    };
  }
}

/**
 * Number of non-excluded files under root, without reading any content.
 * Throws SyncInterruptedError as soon as the signal is aborted.
 */
export async function countSourceFiles(
  root: string,
  exclusions: ReadonlySet<string>,
  signal?: AbortSignal
): Promise<number> {
  let count = 0;
  for await (const entry of walkSourceTree(root, exclusions)) {
    if (signal?.aborted) {
      throw new SyncInterruptedError(0);
    }
    if (entry.kind === 'file') {
      count++;
    }
  }
  return count;
}
