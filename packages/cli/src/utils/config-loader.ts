/**
 * Configuration Loader
 *
 * `--config <path>` loads exactly that file; otherwise the nearest
 * values-schema.config.yaml above the working directory is used, or defaults.
 */

import { resolve } from 'node:path';

import { findAndLoadConfig, loadConfigFromFile, type LoadedConfig } from '@values-schema/config';
import type { Logger } from '@values-schema/utils';

/**
 * @throws ConfigError when the file is missing (explicit path only) or invalid
 */
export async function loadCliConfig(
  configPath: string | undefined,
  cwd: string,
  logger?: Logger
): Promise<LoadedConfig> {
  if (configPath !== undefined) {
    return loadConfigFromFile(resolve(cwd, configPath));
  }
  return findAndLoadConfig(cwd, logger);
}
