/**
 * Structural schema equality
 *
 * Decides whether two definitions registered under one name are the same
 * definition. Prose (`title`, `description`) and vendor extensions are ignored.
 */

import { isDeepStrictEqual } from 'node:util';

import type { Schema } from './schema.js';

function equalRecords(a: Record<string, Schema> | undefined, b: Record<string, Schema> | undefined): boolean {
  const left = a ?? {};
  const right = b ?? {};
  const keys = Object.keys(left);
  if (keys.length !== Object.keys(right).length) {
    return false;
  }
  return keys.every((key) => Object.hasOwn(right, key) && schemasEqual(left[key], right[key]));
}

function equalLists(a: Schema[] | undefined, b: Schema[] | undefined): boolean {
  const left = a ?? [];
  const right = b ?? [];
  return left.length === right.length && left.every((schema, index) => schemasEqual(schema, right[index]));
}

function equalAdditionalProperties(a: Schema['additionalProperties'], b: Schema['additionalProperties']): boolean {
  if (typeof a === 'object' && typeof b === 'object') {
    return schemasEqual(a, b);
  }
  return a === b;
}

/**
 * Compare two schema nodes, ignoring descriptive fields
 *
 * Two missing nodes are equal; a missing node never equals a present one.
 */
export function schemasEqual(a: Schema | undefined, b: Schema | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }

  if (
    (a.pattern ?? '') !== (b.pattern ?? '') ||
    (a.format ?? '') !== (b.format ?? '') ||
    Boolean(a.deprecated) !== Boolean(b.deprecated) ||
    Boolean(a.readOnly) !== Boolean(b.readOnly) ||
    Boolean(a.writeOnly) !== Boolean(b.writeOnly) ||
    Boolean(a.uniqueItems) !== Boolean(b.uniqueItems) ||
    (a.$ref ?? '') !== (b.$ref ?? '')
  ) {
    return false;
  }

  if (a.type.length !== b.type.length || a.type.some((type, index) => type !== b.type[index])) {
    return false;
  }

  const numeric = [
    'minimum',
    'maximum',
    'exclusiveMinimum',
    'exclusiveMaximum',
    'multipleOf',
    'minLength',
    'maxLength',
    'minItems',
    'maxItems',
  ] as const;
  if (numeric.some((field) => a[field] !== b[field])) {
    return false;
  }

  if (
    !isDeepStrictEqual(a.default, b.default) ||
    !isDeepStrictEqual(a.const, b.const) ||
    !isDeepStrictEqual(a.enum, b.enum) ||
    !isDeepStrictEqual(a.examples, b.examples)
  ) {
    return false;
  }

  if (
    !isDeepStrictEqual(a.required, b.required) ||
    a.requiredFlag !== b.requiredFlag ||
    !equalAdditionalProperties(a.additionalProperties, b.additionalProperties)
  ) {
    return false;
  }

  return (
    equalRecords(a.properties, b.properties) &&
    equalRecords(a.definitions, b.definitions) &&
    equalRecords(a.patternProperties, b.patternProperties) &&
    schemasEqual(a.items, b.items) &&
    schemasEqual(a.if, b.if) &&
    schemasEqual(a.then, b.then) &&
    schemasEqual(a.else, b.else) &&
    schemasEqual(a.not, b.not) &&
    equalLists(a.anyOf, b.anyOf) &&
    equalLists(a.allOf, b.allOf) &&
    equalLists(a.oneOf, b.oneOf)
  );
}
