/**
 * Configuration Defaults
 *
 * Values used when neither the config file nor a command-line flag sets an option.
 *
 * @example
 * ```typescript
 * import { CONFIG_DEFAULTS } from '@values-schema/config';
 *
 * const outputFile = config.outputFile ?? CONFIG_DEFAULTS.OUTPUT_FILE;
 * ```
 */

import { DEFAULT_REMOTE_TIMEOUT_MS } from '@values-schema/core';

export const CONFIG_DEFAULTS = {
  /** Charts are searched below this directory */
  CHART_SEARCH_ROOT: '.' as const,

  /** Candidate values file names, first existing one wins */
  VALUES_FILES: ['values.yaml'] as const,

  /** Written next to the values file */
  OUTPUT_FILE: 'values.schema.json' as const,

  REMOTE_TIMEOUT_MS: DEFAULT_REMOTE_TIMEOUT_MS,
} as const;

export type ConfigDefaults = typeof CONFIG_DEFAULTS;
