import { schemasEqual } from './equality.js';
import { DefinitionConflictError } from './errors.js';
import type { Schema } from './schema.js';

/**
 * Merge definitions into a registry
 *
 * Re-registering an equal definition keeps the existing entry.
 *
 * @throws DefinitionConflictError when a name is already taken by a different schema
 */
export function mergeDefinitions(registry: Record<string, Schema>, incoming: Record<string, Schema>): void {
  for (const [name, definition] of Object.entries(incoming)) {
    const existing = Object.hasOwn(registry, name) ? registry[name] : undefined;
    if (existing === undefined) {
      registry[name] = definition;
    } else if (!schemasEqual(existing, definition)) {
      throw new DefinitionConflictError(name);
    }
  }
}
