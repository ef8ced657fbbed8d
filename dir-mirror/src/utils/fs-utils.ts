import { readdir, stat } from 'fs/promises';
import type { Dirent } from 'fs';
import { logger, renderPath } from './logger.js';

export interface FileStats {
  size: number;
  /** Seconds since the epoch, sub-second precision */
  modifiedTime: number;
  /** Seconds since the epoch, sub-second precision */
  accessedTime: number;
  mode: number;
  isFile: boolean;
  isDirectory: boolean;
}

/**
 * Get file statistics, following symlinks
 */
export async function getFileStats(path: string): Promise<FileStats> {
  const stats = await stat(path);
  return {
    size: stats.size,
    modifiedTime: stats.mtimeMs / 1000,
    accessedTime: stats.atimeMs / 1000,
    mode: stats.mode,
    isFile: stats.isFile(),
    isDirectory: stats.isDirectory(),
  };
}

/**
 * Stats for a path, or null if it does not exist or cannot be reached
 */
export async function statOrNull(path: string): Promise<FileStats | null> {
  try {
    return await getFileStats(path);
  } catch {
    return null;
  }
}

/**
 * Check if a path is accessible
 */
export async function isAccessible(path: string): Promise<boolean> {
  return (await statOrNull(path)) !== null;
}

/**
 * Read directory entries safely, sorted by name
 */
export async function readDirSafe(path: string): Promise<Dirent[] | null> {
  try {
    const entries = await readdir(path, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error) {
    logger.warn(`Cannot read directory: ${renderPath(path)}`);
    logger.debug(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}
