/**
 * Schema Validator
 *
 * Checks a finished schema node: draft-07 syntax (Ajv meta-schema validation)
 * plus cross-field rules Ajv accepts but that make no sense for a values file,
 * such as `format` on an integer.
 */

import AjvModule from 'ajv';

import { SchemaValidationError } from './errors.js';
import { isSchemaTypeName, type Schema } from './schema.js';
import { toJsonSchema } from './schema-codec.js';

const Ajv = AjvModule.default;

export const SUPPORTED_FORMATS: ReadonlySet<string> = new Set([
  'date-time',
  'time',
  'date',
  'duration',
  'email',
  'idn-email',
  'hostname',
  'idn-hostname',
  'ipv4',
  'ipv6',
  'uuid',
  'uri',
  'uri-reference',
  'iri',
  'iri-reference',
  'uri-template',
  'json-pointer',
  'relative-json-pointer',
  'regex',
]);

export type ValidationResult = { success: true } | { success: false; error: SchemaValidationError };

const OK: ValidationResult = { success: true };

function fail(rule: SchemaValidationError['rule'], message: string): ValidationResult {
  return { success: false, error: new SchemaValidationError(rule, message) };
}

let metaValidator: InstanceType<typeof Ajv> | undefined;

function getMetaValidator(): InstanceType<typeof Ajv> {
  metaValidator ??= new Ajv({ strict: false, validateFormats: false });
  return metaValidator;
}

function describeType(schema: Schema): string {
  return `[${schema.type.join(' ')}]`;
}

function allowsType(schema: Schema, type: string): boolean {
  return schema.type.length === 0 || schema.type.includes(type);
}

/**
 * Draft-07 syntax check of the serialized node plus known type names
 */
export function checkSchemaSyntax(schema: Schema): ValidationResult {
  const ajv = getMetaValidator();
  const valid = ajv.validateSchema(toJsonSchema(schema));
  if (valid !== true) {
    return fail('syntax', `invalid schema syntax: ${ajv.errorsText(ajv.errors)}`);
  }

  const unknown = schema.type.filter((type) => !isSchemaTypeName(type));
  if (unknown.length > 0) {
    return fail('type', `unsupported type: ${unknown.join(', ')}`);
  }
  return OK;
}

function checkTypeConstraints(schema: Schema): ValidationResult {
  if (schema.const !== undefined && schema.type.length > 0) {
    return fail('const-type', "cannot use both 'const' and 'type' in the same schema");
  }
  if (schema.enum !== undefined && schema.type.length > 0) {
    return fail('enum-type', "cannot use both 'enum' and 'type' in the same schema");
  }
  return OK;
}

function checkNumericConstraints(schema: Schema): ValidationResult {
  const { minimum, maximum, exclusiveMinimum, exclusiveMaximum, multipleOf } = schema;
  const constrained = [minimum, maximum, exclusiveMinimum, exclusiveMaximum, multipleOf].some(
    (value) => value !== undefined
  );
  if (!constrained) {
    return OK;
  }

  if (schema.type.length > 0 && !schema.type.includes('number') && !schema.type.includes('integer')) {
    return fail(
      'numeric-type',
      `numeric constraints can only be used with number or integer types, got ${describeType(schema)}`
    );
  }
  if (multipleOf !== undefined && multipleOf <= 0) {
    return fail('multiple-of', 'multipleOf must be greater than 0');
  }
  if (minimum !== undefined && exclusiveMinimum !== undefined) {
    return fail('minimum-exclusive', 'cannot use both minimum and exclusiveMinimum');
  }
  if (maximum !== undefined && exclusiveMaximum !== undefined) {
    return fail('maximum-exclusive', 'cannot use both maximum and exclusiveMaximum');
  }
  return OK;
}

function checkStringConstraints(schema: Schema): ValidationResult {
  if (schema.format) {
    if (!allowsType(schema, 'string')) {
      return fail('format-type', `format can only be used with string type, got ${describeType(schema)}`);
    }
    if (!SUPPORTED_FORMATS.has(schema.format)) {
      return fail('format-unsupported', `unsupported format: ${schema.format}`);
    }
  }
  if (schema.pattern && !allowsType(schema, 'string')) {
    return fail('pattern-type', `pattern can only be used with string type, got ${describeType(schema)}`);
  }
  if (schema.format && schema.pattern) {
    return fail('format-pattern', 'cannot use both format and pattern in the same schema');
  }
  const { minLength, maxLength } = schema;
  if (minLength !== undefined && maxLength !== undefined && minLength > maxLength) {
    return fail('length-range', `minLength (${minLength}) cannot be greater than maxLength (${maxLength})`);
  }
  return OK;
}

function checkArrayConstraints(schema: Schema): ValidationResult {
  if (schema.items) {
    if (!allowsType(schema, 'array')) {
      return fail('items-type', `items can only be used with array type, got ${describeType(schema)}`);
    }
    const nested = validateSchema(schema.items);
    if (!nested.success) {
      return fail('items-schema', `invalid items schema: ${nested.error.message}`);
    }
  }

  const { minItems, maxItems } = schema;
  if (minItems !== undefined || maxItems !== undefined) {
    if (!allowsType(schema, 'array')) {
      return fail('item-count-type', `minItems/maxItems can only be used with array type, got ${describeType(schema)}`);
    }
    if (minItems !== undefined && maxItems !== undefined && maxItems < minItems) {
      return fail('item-count-range', `maxItems (${maxItems}) cannot be less than minItems (${minItems})`);
    }
  }
  return OK;
}

function checkNestedSchemas(schema: Schema): ValidationResult {
  const nested: Schema[] = [
    ...(schema.allOf ?? []),
    ...(schema.anyOf ?? []),
    ...(schema.oneOf ?? []),
    ...[schema.if, schema.then, schema.else, schema.not].filter((child): child is Schema => child !== undefined),
    ...Object.values(schema.definitions ?? {}),
  ];

  for (const child of nested) {
    const result = validateSchema(child);
    if (!result.success) {
      return result;
    }
  }
  return OK;
}

// Cross-field rules run before the meta-schema check so that values the
// meta-schema also rejects (multipleOf: 0) get the rule's own message
const CHECKS: ReadonlyArray<(schema: Schema) => ValidationResult> = [
  checkTypeConstraints,
  checkNumericConstraints,
  checkStringConstraints,
  checkArrayConstraints,
  checkNestedSchemas,
  checkSchemaSyntax,
];

/**
 * Validate a schema node, returning the first rule it violates
 *
 * @example
 * ```typescript
 * const result = validateSchema(schema);
 * if (!result.success) {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function validateSchema(schema: Schema): ValidationResult {
  for (const check of CHECKS) {
    const result = check(schema);
    if (!result.success) {
      return result;
    }
  }
  return OK;
}

/**
 * Throwing form of validateSchema()
 *
 * @param key - Values key the schema belongs to; included in the error message
 * @throws SchemaValidationError
 */
export function assertValidSchema(schema: Schema, key?: string): void {
  const result = validateSchema(schema);
  if (!result.success) {
    throw key === undefined ? result.error : result.error.forKey(key);
  }
}
