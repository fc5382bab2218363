/**
 * Config Command
 *
 * Show, validate, or export the JSON Schema of the values-schema configuration.
 */

import { CONFIG_FILE_NAME, ConfigError, generateConfigJsonSchema, type LoadedConfig } from '@values-schema/config';
import chalk from 'chalk';
import type { Command } from 'commander';
import { stringify as stringifyYaml } from 'yaml';

import { loadCliConfig } from '../utils/config-loader.js';
import { displayFailure } from '../utils/error-reporter.js';

export interface ConfigCommandOptions {
  validate?: boolean;
  jsonSchema?: boolean;
  config?: string;
}

function displayLoadedConfig(loaded: LoadedConfig): void {
  process.stdout.write(stringifyYaml(loaded.config));
  if (loaded.filePath === undefined) {
    console.error(chalk.gray(`# No ${CONFIG_FILE_NAME} found, showing defaults`));
  }
}

/**
 * Run `config` and return the exit code
 */
export async function runConfig(options: ConfigCommandOptions, cwd: string = process.cwd()): Promise<number> {
  if (options.jsonSchema) {
    console.log(JSON.stringify(generateConfigJsonSchema(), null, 2));
    return 0;
  }

  let loaded: LoadedConfig;
  try {
    loaded = await loadCliConfig(options.config, cwd);
  } catch (error) {
    if (error instanceof ConfigError) {
      displayFailure(error, error.filePath);
      return 1;
    }
    throw error;
  }

  if (options.validate) {
    console.log(chalk.green('✅ Configuration is valid'));
    console.log(
      chalk.gray(loaded.filePath === undefined ? `   No ${CONFIG_FILE_NAME} found, defaults apply` : `   ${loaded.filePath}`)
    );
    return 0;
  }

  displayLoadedConfig(loaded);
  return 0;
}

export function configCommand(program: Command): void {
  program
    .command('config')
    .description('Show or validate values-schema configuration')
    .option('--validate', 'Validate configuration only (exit 0 if valid, 1 if invalid)')
    .option('--json-schema', 'Print the JSON Schema of values-schema.config.yaml')
    .option('--config <path>', 'Config file to use instead of searching for values-schema.config.yaml')
    .action(async (options: ConfigCommandOptions) => {
      const exitCode = await runConfig(options);
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    });
}
