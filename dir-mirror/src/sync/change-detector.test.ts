import { describe, it, expect } from 'vitest';
import { filesDiffer } from './change-detector.js';
import type { FileRecord } from './types.js';

const HASH_A = 'a'.repeat(64);
const HASH_B = 'b'.repeat(64);

function record(overrides: Partial<FileRecord> = {}): FileRecord {
  return {
    path: '/source/file.txt',
    size: 10,
    modifiedTime: 1_700_000_000,
    contentHash: HASH_A,
    ...overrides,
  };
}

describe('filesDiffer', () => {
  it('should report a difference when the destination is absent', () => {
    expect(filesDiffer(record(), undefined)).toBe(true);
  });

  it('should treat equal hashes as identical regardless of metadata', () => {
    const source = record();
    const destination = record({ path: '/dest/file.txt', modifiedTime: 1_500_000_000 });

    expect(filesDiffer(source, destination)).toBe(false);
  });

  it('should treat different hashes as different even with matching metadata', () => {
    const source = record();
    const destination = record({ path: '/dest/file.txt', contentHash: HASH_B });

    expect(filesDiffer(source, destination)).toBe(true);
  });

  it('should fall back to size when the source hash is unavailable', () => {
    const source = record({ contentHash: '' });
    const destination = record({ size: 11 });

    expect(filesDiffer(source, destination)).toBe(true);
  });

  it('should fall back to metadata when the destination hash is unavailable', () => {
    const source = record();
    const destination = record({ contentHash: '', modifiedTime: 1_700_000_000.5 });

    expect(filesDiffer(source, destination)).toBe(false);
  });

  it('should accept a modification time difference of exactly one second', () => {
    const source = record({ contentHash: '' });
    const destination = record({ contentHash: '', modifiedTime: 1_700_000_001 });

    expect(filesDiffer(source, destination)).toBe(false);
  });

  it('should report a difference beyond the tolerance window', () => {
    const source = record({ contentHash: '' });
    const destination = record({ contentHash: '', modifiedTime: 1_700_000_001.5 });

    expect(filesDiffer(source, destination)).toBe(true);
  });

  it('should honour a custom tolerance', () => {
    const source = record({ contentHash: '' });
    const destination = record({ contentHash: '', modifiedTime: 1_700_000_001.5 });

    expect(filesDiffer(source, destination, 2)).toBe(false);
  });
});
