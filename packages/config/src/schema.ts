/**
 * Configuration Schema with Zod Validation
 *
 * Shape of `values-schema.config.yaml`. Every key is optional; defaults are
 * applied on parse so the resolved config is complete.
 */

import { SKIP_AUTO_GENERATION_FIELDS } from '@values-schema/core';
import { z } from 'zod';

import { CONFIG_DEFAULTS } from './constants.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const ValuesSchemaConfigSchema = z
  .object({
    /** Editor schema reference, ignored by the tool */
    $schema: z.string().optional(),

    /** Directory searched for charts, relative to the config file */
    chartSearchRoot: z
      .string()
      .min(1, 'Chart search root cannot be empty')
      .optional()
      .default(CONFIG_DEFAULTS.CHART_SEARCH_ROOT),

    /** Candidate values file names per chart; the first existing one is used */
    valuesFiles: z
      .array(z.string().min(1, 'Values file name cannot be empty'))
      .min(1, 'At least one values file name required')
      .optional()
      .default([...CONFIG_DEFAULTS.VALUES_FILES]),

    /** Schema file name written next to the values file */
    outputFile: z.string().min(1, 'Output file cannot be empty').optional().default(CONFIG_DEFAULTS.OUTPUT_FILE),

    keepFullComment: z.boolean().optional().default(false),
    helmDocsCompatibilityMode: z.boolean().optional().default(false),
    keepHelmDocsPrefix: z.boolean().optional().default(false),
    skipGlobal: z.boolean().optional().default(false),
    resolveRemote: z.boolean().optional().default(false),

    /** Fields inference must leave alone */
    skipAutoGeneration: z.array(z.enum(SKIP_AUTO_GENERATION_FIELDS)).optional().default([]),

    disableRequired: z.boolean().optional().default(false),
    appendNewline: z.boolean().optional().default(false),

    /** Timeout for each remote schema download (milliseconds) */
    remoteTimeoutMs: z
      .number()
      .int()
      .positive('Remote timeout must be positive')
      .optional()
      .default(CONFIG_DEFAULTS.REMOTE_TIMEOUT_MS),

    /** Overrides VALUES_SCHEMA_DEBUG; `--log-level` overrides this */
    logLevel: LogLevelSchema.optional(),
  })
  .strict();

// Input type keeps optional fields optional for people writing configs
export type ValuesSchemaConfig = z.input<typeof ValuesSchemaConfigSchema>;

export type ResolvedConfig = z.output<typeof ValuesSchemaConfigSchema>;

export type ConfigValidationResult = { success: true; data: ResolvedConfig } | { success: false; errors: string[] };

/**
 * Format zod issues as `path: message` lines
 */
export function formatConfigIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a parsed config document, applying defaults
 */
export function safeValidateConfig(data: unknown): ConfigValidationResult {
  const result = ValuesSchemaConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatConfigIssues(result.error) };
}

/**
 * The configuration used when no config file exists
 */
export function defaultConfig(): ResolvedConfig {
  return ValuesSchemaConfigSchema.parse({});
}
