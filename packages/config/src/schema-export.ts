/**
 * JSON Schema Export for YAML Configuration
 *
 * Lets editors validate and complete `values-schema.config.yaml`:
 *
 * ```yaml
 * # yaml-language-server: $schema=./values-schema.config.schema.json
 * valuesFiles: [values.yaml]
 * ```
 */

import { zodToJsonSchema } from 'zod-to-json-schema';

import { ValuesSchemaConfigSchema } from './schema.js';

export const CONFIG_SCHEMA_NAME = 'ValuesSchemaConfig';

export type ConfigJsonSchema = ReturnType<typeof zodToJsonSchema>;

export function generateConfigJsonSchema(): ConfigJsonSchema {
  return zodToJsonSchema(ValuesSchemaConfigSchema, {
    name: CONFIG_SCHEMA_NAME,
    $refStrategy: 'none',
    target: 'jsonSchema7',
  });
}
