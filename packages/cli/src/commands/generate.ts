/**
 * Generate Command
 *
 * Writes `values.schema.json` next to the values file of every chart below
 * the search root.
 */

import { writeFile } from 'node:fs/promises';
import { join, relative } from 'node:path';

import { ConfigError } from '@values-schema/config';
import {
  RemoteSchemaStore,
  createHttpSchemaFetcher,
  formatSchema,
  generateValuesSchemaFromFile,
  type SchemaFetcher,
} from '@values-schema/core';
import { LOG_LEVELS, createLogger, type Logger } from '@values-schema/utils';
import chalk from 'chalk';
import { InvalidArgumentError, Option, type Command } from 'commander';

import { discoverCharts, findValuesFile } from '../utils/chart-discovery.js';
import { loadCliConfig } from '../utils/config-loader.js';
import { displayFailure } from '../utils/error-reporter.js';
import { resolveGenerateSettings, type GenerateFlags, type GenerateSettings } from '../utils/settings.js';

export interface GenerateDependencies {
  /** Working directory (default: process.cwd()) */
  cwd?: string;
  /** Replaces the HTTP fetcher for remote `$ref`s */
  fetcher?: SchemaFetcher;
}

/**
 * Parse a comma-separated option value
 */
export function parseCommaList(value: string, previous: string[] = []): string[] {
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
  return [...previous, ...items];
}

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

async function generateChart(
  chartDir: string,
  settings: GenerateSettings,
  store: RemoteSchemaStore,
  logger: Logger,
  cwd: string
): Promise<void> {
  const valuesPath = findValuesFile(chartDir, settings.valuesFiles);
  if (valuesPath === undefined) {
    logger.warn('values', `No values file found in ${chartDir} (tried: ${settings.valuesFiles.join(', ')})`);
    return;
  }

  logger.debug('values', `Generating schema for ${valuesPath}`);
  const schema = await generateValuesSchemaFromFile(valuesPath, {
    ...settings.engine,
    logger,
    remoteStore: store,
  });

  if (settings.dryRun) {
    console.log(formatSchema(schema));
    return;
  }

  const outputPath = join(chartDir, settings.outputFile);
  await writeFile(outputPath, formatSchema(schema, { appendNewline: settings.appendNewline }), 'utf-8');
  logger.debug('output', `Wrote ${outputPath}`);
  console.log(chalk.green(`✅ ${relative(cwd, outputPath)}`));
}

/**
 * Run `generate` and return the exit code
 *
 * Charts are processed in sorted order; the first failing chart stops the run.
 */
export async function runGenerate(flags: GenerateFlags, deps: GenerateDependencies = {}): Promise<number> {
  const cwd = deps.cwd ?? process.cwd();

  let settings: GenerateSettings;
  try {
    const loaded = await loadCliConfig(flags.config, cwd);
    settings = resolveGenerateSettings(flags, loaded, cwd);
  } catch (error) {
    if (error instanceof ConfigError) {
      displayFailure(error, error.filePath);
      return 1;
    }
    throw error;
  }

  const logger = createLogger({ level: settings.logLevel });

  let charts: string[];
  try {
    charts = await discoverCharts(settings.chartSearchRoot);
  } catch (error) {
    displayFailure(error, settings.chartSearchRoot, settings.logLevel);
    return 1;
  }

  if (charts.length === 0) {
    logger.warn('values', `No charts found below ${settings.chartSearchRoot}`);
    return 0;
  }

  const store = new RemoteSchemaStore(
    deps.fetcher ?? createHttpSchemaFetcher({ timeoutMs: settings.engine.remoteTimeoutMs }),
    logger
  );

  for (const chartDir of charts) {
    try {
      await generateChart(chartDir, settings, store, logger, cwd);
    } catch (error) {
      const valuesPath = findValuesFile(chartDir, settings.valuesFiles) ?? chartDir;
      displayFailure(error, relative(cwd, valuesPath), settings.logLevel);
      return 1;
    }
  }

  return 0;
}

export function generateCommand(program: Command): void {
  program
    .command('generate', { isDefault: true })
    .description('Generate values.schema.json for every chart below the search root')
    .option('-c, --chart-search-root <dir>', 'Directory searched for charts (default: config file or ".")')
    .option('-f, --values-files <names>', 'Comma-separated values file names tried in order', parseCommaList)
    .option('-o, --output-file <name>', 'Schema file written next to the values file')
    .option('-d, --dry-run', 'Print schemas to stdout instead of writing files')
    .option('-s, --keep-full-comment', 'Keep every comment paragraph in descriptions')
    .option('-p, --helm-docs-compatibility-mode', 'Also read helm-docs "# --" comments')
    .option('-x, --keep-helm-docs-prefix', 'Keep helm-docs "--" prefixes and @tag lines in descriptions')
    .option('--skip-global', 'Do not add the "global" property')
    .option('-r, --resolve-remote', 'Download $refs pointing at http(s) URLs')
    .option(
      '-k, --skip-auto-generation <fields>',
      'Comma-separated fields never inferred (type, title, description, required, default, additionalProperties)',
      parseCommaList
    )
    .option('--disable-required', 'Remove every required list from the schema')
    .option('-a, --append-newline', 'End schema files with a newline')
    .option('--remote-timeout <ms>', 'Timeout for each remote schema download', parsePositiveInteger)
    .addOption(new Option('-l, --log-level <level>', 'Minimum log level written to stderr').choices(LOG_LEVELS))
    .option('--config <path>', 'Config file to use instead of searching for values-schema.config.yaml')
    .action(async (options: GenerateFlags) => {
      const exitCode = await runGenerate(options);
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    });
}
