import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { logger, renderPath } from '../utils/logger.js';
import { errorMessage } from './errors.js';

export const DEFAULT_CHUNK_SIZE = 8192;

/**
 * Computes the SHA-256 of a file, reading it in fixed-size blocks
 * @param filePath - File to hash
 * @param chunkSize - Block size for each read
 * @returns Hex digest, or '' when the file cannot be opened or read
 */
export async function hashFile(filePath: string, chunkSize: number = DEFAULT_CHUNK_SIZE): Promise<string> {
  const hash = createHash('sha256');

  try {
    const stream = createReadStream(filePath, { highWaterMark: chunkSize });
    for await (const chunk of stream) {
      hash.update(chunk);
    }
  } catch (error) {
    logger.error(`Error calculating hash for ${renderPath(filePath)}: ${errorMessage(error)}`);
    return '';
  }

  return hash.digest('hex');
}

