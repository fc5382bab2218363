/**
 * @values-schema/cli
 *
 * Command implementations, for embedding the generator in other tooling.
 */

export { createProgram } from './program.js';
export {
  generateCommand,
  parseCommaList,
  parsePositiveInteger,
  runGenerate,
  type GenerateDependencies,
} from './commands/generate.js';
export { configCommand, runConfig, type ConfigCommandOptions } from './commands/config.js';
export { CHART_FILE_NAME, discoverCharts, findValuesFile } from './utils/chart-discovery.js';
export { loadCliConfig } from './utils/config-loader.js';
export { displayFailure, failureTitle, formatFailure } from './utils/error-reporter.js';
export {
  parseLogLevel,
  resolveGenerateSettings,
  type EngineOptions,
  type GenerateFlags,
  type GenerateSettings,
} from './utils/settings.js';
