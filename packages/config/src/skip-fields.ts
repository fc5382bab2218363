import {
  isSkipAutoGenerationField,
  skipAutoGeneration,
  type SkipAutoGeneration,
  type SkipAutoGenerationField,
} from '@values-schema/core';

import { ConfigError } from './errors.js';

/**
 * Turn field names (from `--skip-auto-generation` or the config file) into a skip configuration
 *
 * @throws ConfigError naming every unsupported field at once
 *
 * @example
 * ```typescript
 * parseSkipAutoGeneration(['title', 'default']);
 * // { type: false, title: true, description: false, required: false, default: true, additionalProperties: false }
 * ```
 */
export function parseSkipAutoGeneration(names: readonly string[]): SkipAutoGeneration {
  const fields: SkipAutoGenerationField[] = [];
  const unsupported: string[] = [];

  for (const name of names) {
    const trimmed = name.trim();
    if (trimmed === '') {
      continue;
    }
    if (isSkipAutoGenerationField(trimmed)) {
      fields.push(trimmed);
    } else {
      unsupported.push(trimmed);
    }
  }

  if (unsupported.length > 0) {
    const quoted = unsupported.map((name) => `'${name}'`).join(', ');
    throw new ConfigError(`unsupported field names ${quoted} for skipping auto-generation`);
  }

  return skipAutoGeneration(fields);
}
