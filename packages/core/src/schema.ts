/**
 * Schema Tree
 *
 * In-memory model of a (partial) JSON Schema draft-07 node as produced by
 * inference and annotations. Polymorphic JSON fields are normalized on decode:
 *
 * - `type` is always a list (`[]` = unconstrained, `['string', 'null']` = nullable)
 * - `required` is always a list of names; the per-property boolean shorthand lives
 *   in `requiredFlag` until the fixup pass moves it into the parent's list
 * - `additionalProperties` stays a `boolean | Schema` union
 */

export const DRAFT_07_SCHEMA = 'http://json-schema.org/draft-07/schema#';

/** Vendor extension keys must start with this prefix */
export const EXTENSION_PREFIX = 'x-';

export const DEFINITIONS_REF_PREFIX = '#/definitions/';

export const SCHEMA_TYPES = [
  'object',
  'string',
  'integer',
  'number',
  'array',
  'null',
  'boolean',
] as const;

export type SchemaTypeName = (typeof SCHEMA_TYPES)[number];

export function isSchemaTypeName(value: string): value is SchemaTypeName {
  return SCHEMA_TYPES.some((type) => type === value);
}

export interface Schema {
  // Identity / meta
  $schema?: string;
  $id?: string;
  $ref?: string;
  title?: string;
  description?: string;
  deprecated?: boolean;
  readOnly?: boolean;
  writeOnly?: boolean;
  default?: unknown;
  examples?: unknown[];
  const?: unknown;
  enum?: unknown[];

  type: string[];

  // Numeric
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: number;
  exclusiveMaximum?: number;
  multipleOf?: number;

  // String
  pattern?: string;
  format?: string;
  minLength?: number;
  maxLength?: number;

  // Array
  items?: Schema;
  minItems?: number;
  maxItems?: number;
  uniqueItems?: boolean;

  // Object
  properties?: Record<string, Schema>;
  patternProperties?: Record<string, Schema>;
  additionalProperties?: boolean | Schema;
  required: string[];
  /** `required: true` shorthand: "mark me required in my parent" */
  requiredFlag: boolean;

  // Composition / conditionals
  anyOf?: Schema[];
  allOf?: Schema[];
  oneOf?: Schema[];
  not?: Schema;
  if?: Schema;
  then?: Schema;
  else?: Schema;

  definitions?: Record<string, Schema>;

  /** `x-*` vendor keys, inlined at the top level on serialization */
  extensions: Record<string, unknown>;

  /** Populated from an explicit annotation rather than left for inference. Never serialized. */
  hasExplicitData: boolean;
}

/**
 * Create an empty schema node, optionally constrained to one primitive type
 *
 * @example
 * ```typescript
 * createSchema('object'); // { type: ['object'], required: [], ... }
 * createSchema();         // unconstrained placeholder (e.g. sequence items)
 * ```
 */
export function createSchema(type?: SchemaTypeName): Schema {
  return {
    type: type ? [type] : [],
    required: [],
    requiredFlag: false,
    extensions: {},
    hasExplicitData: false,
  };
}

export function hasType(schema: Schema, type: SchemaTypeName): boolean {
  return schema.type.includes(type);
}

export function isUnconstrained(schema: Schema): boolean {
  return schema.type.length === 0;
}

export function hasEntries<T>(record: Record<string, T> | undefined): record is Record<string, T> {
  return record !== undefined && Object.keys(record).length > 0;
}

/**
 * Visit every direct child schema of a node
 *
 * Covers properties, patternProperties, definitions, items, the schema form of
 * additionalProperties, if/then/else, not and the anyOf/allOf/oneOf lists.
 */
export function forEachChildSchema(schema: Schema, visit: (child: Schema) => void): void {
  for (const record of [schema.properties, schema.patternProperties, schema.definitions]) {
    if (record) {
      Object.values(record).forEach(visit);
    }
  }
  for (const child of [schema.items, schema.if, schema.then, schema.else, schema.not]) {
    if (child) {
      visit(child);
    }
  }
  if (typeof schema.additionalProperties === 'object') {
    visit(schema.additionalProperties);
  }
  for (const list of [schema.anyOf, schema.allOf, schema.oneOf]) {
    list?.forEach(visit);
  }
}

/**
 * True if the node or any of its descendants carries a `$ref`
 */
export function containsReference(schema: Schema): boolean {
  if (schema.$ref) {
    return true;
  }
  let found = false;
  forEachChildSchema(schema, (child) => {
    found = found || containsReference(child);
  });
  return found;
}

/**
 * Deep copy of a schema node (definitions inlined from the registry must not alias it)
 */
export function cloneSchema(schema: Schema): Schema {
  return structuredClone(schema);
}
