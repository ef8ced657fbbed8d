import { describe, it, expect } from 'vitest';
import { formatBytes, formatDuration, formatSummaryLines, renderProgressLine, truncateName } from './format.js';
import { createRunStatistics } from '../sync/types.js';

describe('formatBytes', () => {
  it('should format each unit with one decimal', () => {
    expect(formatBytes(0)).toBe('0.0 B');
    expect(formatBytes(1023)).toBe('1023.0 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(1024 * 1024)).toBe('1.0 MB');
    expect(formatBytes(5 * 1024 ** 3)).toBe('5.0 GB');
  });
});

describe('formatDuration', () => {
  it('should pick milliseconds, seconds or minutes', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(1500)).toBe('1.50s');
    expect(formatDuration(90000)).toBe('1.50m');
  });
});

describe('truncateName', () => {
  it('should keep short names', () => {
    expect(truncateName('a.txt')).toBe('a.txt');
    expect(truncateName('x'.repeat(50))).toBe('x'.repeat(50));
  });

  it('should keep the tail of long names', () => {
    const name = 'a'.repeat(20) + 'b'.repeat(40);

    expect(truncateName(name)).toBe('...' + 'a'.repeat(7) + 'b'.repeat(40));
  });
});

describe('renderProgressLine', () => {
  it('should draw a half-filled bar', () => {
    expect(renderProgressLine(1, 2, 'a.txt')).toBe(`[${'#'.repeat(20)}${'-'.repeat(20)}] 50.0% (1/2) - a.txt`);
  });

  it('should draw a full bar without a name', () => {
    expect(renderProgressLine(3, 3)).toBe(`[${'#'.repeat(40)}] 100.0% (3/3)`);
  });

  it('should draw an empty bar for an empty run', () => {
    expect(renderProgressLine(0, 0)).toBe(`[${'-'.repeat(40)}] 0.0% (0/0)`);
  });
});

describe('formatSummaryLines', () => {
  it('should list every counter', () => {
    const stats = { ...createRunStatistics(), filesChecked: 1200, filesCopied: 2, bytesCopied: 2048, errors: 1 };

    const lines = formatSummaryLines(stats, {
      source: '/src',
      destination: '/dst',
      dryRun: false,
      durationMs: 250,
    });

    expect(lines).toEqual([
      'Source:              /src',
      'Destination:         /dst',
      'Duration:            250ms',
      'Dry run:             false',
      '-'.repeat(60),
      'Files checked:       1,200',
      'Files copied:        2',
      'Files skipped:       0',
      'Files excluded:      0',
      'Directories created: 0',
      'Bytes copied:        2,048 (2.0 KB)',
      'Errors:              1',
    ]);
  });
});
