import { readFile } from 'fs/promises';
import { join, resolve } from 'path';
import { homedir } from 'os';
import type { MirrorConfig } from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigError } from '../sync/errors.js';
import { logger } from '../utils/logger.js';
import { isAccessible } from '../utils/fs-utils.js';

export const LOCAL_CONFIG_NAME = 'dir-mirror.json';

/**
 * Where implicit configuration files are looked up
 */
export interface ConfigLocations {
  cwd: string;
  homeDir: string;
}

/**
 * Load configuration from file
 */
async function loadConfigFile(path: string): Promise<Partial<MirrorConfig> | null> {
  if (!(await isAccessible(path))) {
    return null;
  }

  try {
    const content = await readFile(path, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      logger.warn(`Config file is not a JSON object: ${path}`);
      return null;
    }
    logger.debug(`Loaded config from: ${path}`);
    // Field types are checked by validateConfig after merging
    return parsed as Partial<MirrorConfig>;
  } catch (error) {
    logger.warn(`Failed to parse config file: ${path}`);
    logger.debug(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

/**
 * Merge configurations with precedence (later wins)
 */
function mergeConfigs(...configs: Array<Partial<MirrorConfig> | null>): MirrorConfig {
  const merged: MirrorConfig = { ...DEFAULT_CONFIG, extraExclusions: [...DEFAULT_CONFIG.extraExclusions] };

  for (const config of configs) {
    if (!config) continue;

    if (config.cacheFile !== undefined) merged.cacheFile = config.cacheFile;
    if (config.logFile !== undefined) merged.logFile = config.logFile;
    if (config.useCache !== undefined) merged.useCache = config.useCache;
    if (config.chunkSize !== undefined) merged.chunkSize = config.chunkSize;
    if (config.mtimeToleranceSeconds !== undefined) merged.mtimeToleranceSeconds = config.mtimeToleranceSeconds;
    if (config.extraExclusions !== undefined) merged.extraExclusions = config.extraExclusions;
  }

  return merged;
}

/**
 * Validates the merged configuration
 * @throws ConfigError if a value has the wrong type or range
 */
export function validateConfig(config: MirrorConfig): void {
  if (typeof config.cacheFile !== 'string' || config.cacheFile.length === 0) {
    throw new ConfigError('cacheFile must be a non-empty string');
  }

  if (config.logFile !== null && (typeof config.logFile !== 'string' || config.logFile.length === 0)) {
    throw new ConfigError('logFile must be a non-empty string or null');
  }

  if (typeof config.useCache !== 'boolean') {
    throw new ConfigError('useCache must be true or false');
  }

  if (!Number.isInteger(config.chunkSize) || config.chunkSize < 1) {
    throw new ConfigError('chunkSize must be a positive integer');
  }

  if (
    typeof config.mtimeToleranceSeconds !== 'number' ||
    !Number.isFinite(config.mtimeToleranceSeconds) ||
    config.mtimeToleranceSeconds < 0
  ) {
    throw new ConfigError('mtimeToleranceSeconds must be a number >= 0');
  }

  if (!Array.isArray(config.extraExclusions) || !config.extraExclusions.every(name => typeof name === 'string')) {
    throw new ConfigError('extraExclusions must be an array of names');
  }
}

/**
 * Load configuration with hierarchy:
 * 1. Explicit config file path (highest priority)
 * 2. ~/.config/dir-mirror/config.json
 * 3. ./dir-mirror.json
 * 4. Default config (lowest priority)
 */
export async function loadConfig(
  configPath?: string,
  locations: ConfigLocations = { cwd: process.cwd(), homeDir: homedir() }
): Promise<MirrorConfig> {
  const configs: Array<Partial<MirrorConfig> | null> = [];

  configs.push(await loadConfigFile(join(locations.cwd, LOCAL_CONFIG_NAME)));
  configs.push(await loadConfigFile(join(locations.homeDir, '.config', 'dir-mirror', 'config.json')));

  if (configPath) {
    const explicitPath = resolve(locations.cwd, configPath);
    const explicitConfig = await loadConfigFile(explicitPath);
    if (!explicitConfig) {
      throw new ConfigError(`config file not found or invalid: ${explicitPath}`);
    }
    configs.push(explicitConfig);
  }

  const config = mergeConfigs(...configs);
  validateConfig(config);

  return config;
}
