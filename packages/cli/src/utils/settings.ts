/**
 * Generate settings: command-line flags over config file over defaults
 */

import { resolve } from 'node:path';

import { ConfigError, parseSkipAutoGeneration, type LoadedConfig } from '@values-schema/config';
import type { GenerateOptions } from '@values-schema/core';
import { isLogLevel, levelFromEnv, type LogLevel } from '@values-schema/utils';

/** Options as commander hands them to the `generate` action */
export interface GenerateFlags {
  chartSearchRoot?: string;
  valuesFiles?: string[];
  outputFile?: string;
  dryRun?: boolean;
  keepFullComment?: boolean;
  helmDocsCompatibilityMode?: boolean;
  keepHelmDocsPrefix?: boolean;
  skipGlobal?: boolean;
  resolveRemote?: boolean;
  skipAutoGeneration?: string[];
  disableRequired?: boolean;
  appendNewline?: boolean;
  remoteTimeout?: number;
  logLevel?: string;
  config?: string;
}

/** Engine options with every field resolved */
export type EngineOptions = Required<Omit<GenerateOptions, 'logger' | 'fetcher' | 'remoteStore'>>;

export interface GenerateSettings {
  /** Absolute */
  chartSearchRoot: string;
  valuesFiles: string[];
  outputFile: string;
  dryRun: boolean;
  appendNewline: boolean;
  logLevel: LogLevel;
  engine: EngineOptions;
}

/**
 * Narrow a `--log-level` value
 *
 * @throws ConfigError for unknown levels
 */
export function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new ConfigError(`unsupported log level '${value}'`);
  }
  return value;
}

/**
 * @param cwd - Base of a relative `--chart-search-root`; the config file's own
 *   `chartSearchRoot` is relative to the config file
 * @throws ConfigError for invalid skip fields or log level
 */
export function resolveGenerateSettings(flags: GenerateFlags, loaded: LoadedConfig, cwd: string): GenerateSettings {
  const { config } = loaded;

  const chartSearchRoot =
    flags.chartSearchRoot === undefined
      ? resolve(loaded.baseDir, config.chartSearchRoot)
      : resolve(cwd, flags.chartSearchRoot);

  const logLevel =
    flags.logLevel === undefined ? (config.logLevel ?? levelFromEnv()) : parseLogLevel(flags.logLevel);

  return {
    chartSearchRoot,
    valuesFiles: flags.valuesFiles ?? config.valuesFiles,
    outputFile: flags.outputFile ?? config.outputFile,
    dryRun: flags.dryRun ?? false,
    appendNewline: flags.appendNewline ?? config.appendNewline,
    logLevel,
    engine: {
      keepFullComment: flags.keepFullComment ?? config.keepFullComment,
      helmDocsCompatibilityMode: flags.helmDocsCompatibilityMode ?? config.helmDocsCompatibilityMode,
      keepHelmDocsPrefix: flags.keepHelmDocsPrefix ?? config.keepHelmDocsPrefix,
      skipGlobal: flags.skipGlobal ?? config.skipGlobal,
      resolveRemote: flags.resolveRemote ?? config.resolveRemote,
      skipAutoGeneration: parseSkipAutoGeneration(flags.skipAutoGeneration ?? config.skipAutoGeneration),
      disableRequired: flags.disableRequired ?? config.disableRequired,
      remoteTimeoutMs: flags.remoteTimeout ?? config.remoteTimeoutMs,
    },
  };
}
