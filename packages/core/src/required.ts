/**
 * Required-properties passes
 */

import { forEachChildSchema, hasEntries, type Schema } from './schema.js';

/**
 * Move the `required: true` shorthand of every property into its parent's
 * `required` list, bottom-up. Nodes with properties become objects.
 *
 * Running it twice adds nothing.
 */
export function fixRequiredProperties(schema: Schema): void {
  const properties = schema.properties;

  forEachChildSchema(schema, fixRequiredProperties);

  if (hasEntries(properties)) {
    for (const [name, property] of Object.entries(properties)) {
      if (property.requiredFlag && !schema.required.includes(name)) {
        schema.required.push(name);
      }
    }
    if (!schema.type.includes('object')) {
      schema.type = ['object'];
    }
  }
}

/**
 * Clear every `required` list and shorthand in the tree
 */
export function disableRequiredProperties(schema: Schema): void {
  schema.required = [];
  schema.requiredFlag = false;
  forEachChildSchema(schema, disableRequiredProperties);
}
