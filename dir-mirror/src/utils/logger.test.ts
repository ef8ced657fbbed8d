import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { logger, renderPath, isRenderable } from './logger.js';

describe('renderPath', () => {
  it('should leave ordinary paths unchanged', () => {
    expect(renderPath('/photos/2024/Zoë café.jpg')).toBe('/photos/2024/Zoë café.jpg');
  });

  it('should fall back to the file name for lone surrogates', () => {
    expect(renderPath('/photos/bad\uD800dir/img\uDC00.jpg')).toBe('img?.jpg (unrenderable path)');
  });

  it('should fall back to the file name for replacement characters', () => {
    expect(renderPath('/photos/\uFFFD/img.jpg')).toBe('img.jpg (unrenderable path)');
  });

  it('should accept surrogate pairs', () => {
    expect(isRenderable('/music/🎵.flac')).toBe(true);
  });
});

describe('logger', () => {
  let tempDir: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dir-mirror-logger-test-'));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    logger.attachFile(null);
    logger.setDebug(false);
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should append timestamped, leveled lines to the log file', async () => {
    const logFile = path.join(tempDir, 'run.log');
    logger.attachFile(logFile);

    logger.info('first');
    logger.error('second');

    const lines = (await fs.readFile(logFile, 'utf-8')).split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z - INFO - first$/);
    expect(lines[1]).toMatch(/ - ERROR - second$/);
    expect(lines[2]).toBe('');
  });

  it('should append to an existing log file', async () => {
    const logFile = path.join(tempDir, 'run.log');
    await fs.writeFile(logFile, 'earlier run\n');
    logger.attachFile(logFile);

    logger.info('later run');

    const content = await fs.readFile(logFile, 'utf-8');
    expect(content.startsWith('earlier run\n')).toBe(true);
    expect(content).toMatch(/ - INFO - later run\n$/);
  });

  it('should only emit debug lines when enabled', () => {
    logger.debug('hidden');
    expect(logSpy).not.toHaveBeenCalled();

    logger.setDebug(true);
    logger.debug('shown');
    expect(logSpy).toHaveBeenCalledTimes(1);
  });

  it('should render paths safely in path messages', async () => {
    const logFile = path.join(tempDir, 'run.log');
    logger.attachFile(logFile);

    logger.path('info', 'Copied', '/src/\uD800.txt');

    const content = await fs.readFile(logFile, 'utf-8');
    expect(content).toMatch(/ - INFO - Copied: \?\.txt \(unrenderable path\)\n$/);
  });

  it('should detach a log file that cannot be written', () => {
    logger.attachFile(tempDir);

    logger.info('still logged to the console');

    expect(logger.getLogFile()).toBeNull();
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});
