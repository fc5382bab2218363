/**
 * @values-schema/config
 *
 * Optional YAML configuration for values-schema, validated with Zod.
 *
 * @example
 * ```yaml
 * # values-schema.config.yaml
 * chartSearchRoot: charts
 * valuesFiles: [values.yaml, values.yml]
 * helmDocsCompatibilityMode: true
 * skipAutoGeneration: [default]
 * ```
 */

export {
  LogLevelSchema,
  ValuesSchemaConfigSchema,
  defaultConfig,
  formatConfigIssues,
  safeValidateConfig,
  type ConfigValidationResult,
  type ResolvedConfig,
  type ValuesSchemaConfig,
} from './schema.js';

export { CONFIG_FILE_NAME, findAndLoadConfig, findConfigUp, loadConfigFromFile, type LoadedConfig } from './loader.js';

export { CONFIG_SCHEMA_NAME, generateConfigJsonSchema, type ConfigJsonSchema } from './schema-export.js';

export { ConfigError } from './errors.js';
export { parseSkipAutoGeneration } from './skip-fields.js';
export { CONFIG_DEFAULTS, type ConfigDefaults } from './constants.js';
