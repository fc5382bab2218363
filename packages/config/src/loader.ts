/**
 * Configuration Loader
 *
 * Finds `values-schema.config.yaml` by walking up from the working directory
 * (like ESLint or Prettier) and loads it.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';

import { errorMessage } from '@values-schema/core';
import { silentLogger, type Logger } from '@values-schema/utils';
import { parse as parseYaml } from 'yaml';

import { ConfigError } from './errors.js';
import { defaultConfig, safeValidateConfig, type ResolvedConfig } from './schema.js';

/**
 * Configuration file name
 *
 * Only YAML format is supported.
 */
export const CONFIG_FILE_NAME = 'values-schema.config.yaml';

export interface LoadedConfig {
  config: ResolvedConfig;
  /** Absolute path of the file, undefined when defaults are used */
  filePath: string | undefined;
  /** Relative paths inside the config (chartSearchRoot) resolve against this directory */
  baseDir: string;
}

/**
 * Find the config file in `startDir` or the nearest ancestor
 *
 * @returns Absolute path of the config file, or undefined if none exists
 */
export function findConfigUp(startDir: string): string | undefined {
  let currentDir = resolve(startDir);

  for (;;) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

/**
 * Load and validate a config file
 *
 * An empty file is a valid config that sets nothing.
 *
 * @throws ConfigError for unreadable files, YAML syntax errors and schema violations
 */
export async function loadConfigFromFile(configPath: string): Promise<LoadedConfig> {
  const filePath = resolve(configPath);

  if (!/\.ya?ml$/.test(filePath)) {
    throw new ConfigError(`Unsupported config file format: ${filePath}\nOnly .yaml format is supported.`, {
      filePath,
    });
  }

  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`cannot read config file ${filePath}: ${errorMessage(error)}`, { filePath });
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`YAML syntax error in ${filePath}: ${errorMessage(error)}`, { filePath });
  }

  if (raw === null || raw === undefined) {
    raw = {};
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError(`Configuration must be an object: ${filePath}`, { filePath });
  }

  const validation = safeValidateConfig(raw);
  if (!validation.success) {
    throw new ConfigError(`invalid configuration in ${filePath}`, {
      filePath,
      issues: validation.errors,
    });
  }

  return { config: validation.data, filePath, baseDir: dirname(filePath) };
}

/**
 * Load the nearest config file, or fall back to defaults
 *
 * @param cwd - Directory the search starts from (default: process.cwd())
 * @throws ConfigError when a config file exists but is invalid
 */
export async function findAndLoadConfig(cwd: string = process.cwd(), logger: Logger = silentLogger): Promise<LoadedConfig> {
  const configPath = findConfigUp(cwd);
  if (!configPath) {
    logger.debug('config', `No ${CONFIG_FILE_NAME} found from ${resolve(cwd)}, using defaults`);
    return { config: defaultConfig(), filePath: undefined, baseDir: resolve(cwd) };
  }

  logger.debug('config', `Loading configuration from ${configPath}`);
  return loadConfigFromFile(configPath);
}
