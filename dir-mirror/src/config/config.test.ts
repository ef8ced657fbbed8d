import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { loadConfig, LOCAL_CONFIG_NAME } from './config.js';
import type { ConfigLocations } from './config.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigError } from '../sync/errors.js';

describe('loadConfig', () => {
  let tempDir: string;
  let locations: ConfigLocations;

  async function writeJson(filePath: string, value: unknown): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(value, null, 2));
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dir-mirror-config-test-'));
    locations = { cwd: path.join(tempDir, 'cwd'), homeDir: path.join(tempDir, 'home') };
    await fs.mkdir(locations.cwd);
    await fs.mkdir(locations.homeDir);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should return defaults when no config files exist', async () => {
    const config = await loadConfig(undefined, locations);

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('should merge the local config over defaults', async () => {
    await writeJson(path.join(locations.cwd, LOCAL_CONFIG_NAME), {
      cacheFile: 'custom-cache.json',
      extraExclusions: ['Thumbs.db'],
    });

    const config = await loadConfig(undefined, locations);

    expect(config.cacheFile).toBe('custom-cache.json');
    expect(config.extraExclusions).toEqual(['Thumbs.db']);
    expect(config.chunkSize).toBe(8192);
    expect(config.logFile).toBe('dir-mirror.log');
  });

  it('should let the user config override the local config', async () => {
    await writeJson(path.join(locations.cwd, LOCAL_CONFIG_NAME), { chunkSize: 4096, useCache: false });
    await writeJson(path.join(locations.homeDir, '.config', 'dir-mirror', 'config.json'), { chunkSize: 65536 });

    const config = await loadConfig(undefined, locations);

    expect(config.chunkSize).toBe(65536);
    expect(config.useCache).toBe(false);
  });

  it('should give the explicit config the highest priority', async () => {
    await writeJson(path.join(locations.homeDir, '.config', 'dir-mirror', 'config.json'), { logFile: 'home.log' });
    await writeJson(path.join(locations.cwd, 'explicit.json'), { logFile: null });

    const config = await loadConfig('explicit.json', locations);

    expect(config.logFile).toBeNull();
  });

  it('should ignore an implicit config file that is not valid JSON', async () => {
    await fs.writeFile(path.join(locations.cwd, LOCAL_CONFIG_NAME), 'invalid json{{{');

    const config = await loadConfig(undefined, locations);

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('should throw for a missing explicit config file', async () => {
    await expect(loadConfig('nonexistent.json', locations)).rejects.toThrow(
      'Configuration error: config file not found or invalid'
    );
  });

  it('should throw a ConfigError for an explicit config file that is not an object', async () => {
    await writeJson(path.join(locations.cwd, 'list.json'), ['not', 'an', 'object']);

    await expect(loadConfig('list.json', locations)).rejects.toBeInstanceOf(ConfigError);
  });

  it('should validate chunkSize', async () => {
    await writeJson(path.join(locations.cwd, LOCAL_CONFIG_NAME), { chunkSize: 0 });

    await expect(loadConfig(undefined, locations)).rejects.toThrow('chunkSize must be a positive integer');
  });

  it('should validate mtimeToleranceSeconds', async () => {
    await writeJson(path.join(locations.cwd, LOCAL_CONFIG_NAME), { mtimeToleranceSeconds: -1 });

    await expect(loadConfig(undefined, locations)).rejects.toThrow('mtimeToleranceSeconds must be a number >= 0');
  });

  it('should validate extraExclusions', async () => {
    await writeJson(path.join(locations.cwd, LOCAL_CONFIG_NAME), { extraExclusions: 'Thumbs.db' });

    await expect(loadConfig(undefined, locations)).rejects.toThrow('extraExclusions must be an array of names');
  });

  it('should validate useCache', async () => {
    await writeJson(path.join(locations.cwd, LOCAL_CONFIG_NAME), { useCache: 'yes' });

    await expect(loadConfig(undefined, locations)).rejects.toThrow('useCache must be true or false');
  });
});
