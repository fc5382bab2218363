/**
 * Schema Codec
 *
 * Decodes annotation blocks, referenced schema files and downloaded schemas into
 * the Schema Tree (validated with Zod), and encodes the tree back into a plain
 * JSON Schema object.
 */

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { SchemaDecodeError } from './errors.js';
import { EXTENSION_PREFIX, type Schema } from './schema.js';

/**
 * Plain JSON Schema object as written to disk
 */
export type JsonSchemaObject = { [key: string]: unknown };

/** Drop `key: null` entries so YAML `title: ~` reads as "not set" */
function dropNullEntries(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== null));
}

const integer = z.number().int();
const count = z.number().int().nonnegative();

/** `string` or list of strings; YAML nulls inside the list name the `null` type */
const TypeFieldSchema = z
  .union([z.string(), z.array(z.string().nullable())])
  .transform((value) =>
    (Array.isArray(value) ? value.map((entry) => entry ?? 'null') : [value]).filter((entry) => entry !== '')
  );

const RequiredFieldSchema = z.union([z.boolean(), z.array(z.string())]);

export const SchemaNodeSchema: z.ZodType<Schema, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.preprocess(
    dropNullEntries,
    z
      .object({
        $schema: z.string().optional(),
        $id: z.string().optional(),
        $ref: z.string().optional(),
        title: z.string().optional(),
        description: z.string().optional(),
        deprecated: z.boolean().optional(),
        readOnly: z.boolean().optional(),
        writeOnly: z.boolean().optional(),
        default: z.unknown().optional(),
        examples: z.array(z.unknown()).optional(),
        const: z.unknown().optional(),
        enum: z.array(z.unknown()).optional(),
        type: TypeFieldSchema.optional(),
        minimum: integer.optional(),
        maximum: integer.optional(),
        exclusiveMinimum: integer.optional(),
        exclusiveMaximum: integer.optional(),
        multipleOf: integer.optional(),
        pattern: z.string().optional(),
        format: z.string().optional(),
        minLength: count.optional(),
        maxLength: count.optional(),
        items: SchemaNodeSchema.optional(),
        minItems: count.optional(),
        maxItems: count.optional(),
        uniqueItems: z.boolean().optional(),
        properties: z.record(SchemaNodeSchema).optional(),
        patternProperties: z.record(SchemaNodeSchema).optional(),
        additionalProperties: z.union([z.boolean(), SchemaNodeSchema]).optional(),
        required: RequiredFieldSchema.optional(),
        anyOf: z.array(SchemaNodeSchema).optional(),
        allOf: z.array(SchemaNodeSchema).optional(),
        oneOf: z.array(SchemaNodeSchema).optional(),
        not: SchemaNodeSchema.optional(),
        if: SchemaNodeSchema.optional(),
        then: SchemaNodeSchema.optional(),
        else: SchemaNodeSchema.optional(),
        definitions: z.record(SchemaNodeSchema).optional(),
      })
      .passthrough()
      .transform((raw): Schema => {
        const extensions: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(raw)) {
          if (key.startsWith(EXTENSION_PREFIX)) {
            extensions[key] = value;
          }
        }

        return {
          $schema: raw.$schema,
          $id: raw.$id,
          $ref: raw.$ref,
          title: raw.title,
          description: raw.description,
          deprecated: raw.deprecated,
          readOnly: raw.readOnly,
          writeOnly: raw.writeOnly,
          default: raw.default,
          examples: raw.examples,
          const: raw.const,
          enum: raw.enum,
          type: raw.type ?? [],
          minimum: raw.minimum,
          maximum: raw.maximum,
          exclusiveMinimum: raw.exclusiveMinimum,
          exclusiveMaximum: raw.exclusiveMaximum,
          multipleOf: raw.multipleOf,
          pattern: raw.pattern,
          format: raw.format,
          minLength: raw.minLength,
          maxLength: raw.maxLength,
          items: raw.items,
          minItems: raw.minItems,
          maxItems: raw.maxItems,
          uniqueItems: raw.uniqueItems,
          properties: raw.properties,
          patternProperties: raw.patternProperties,
          additionalProperties: raw.additionalProperties,
          required: Array.isArray(raw.required) ? raw.required : [],
          requiredFlag: raw.required === true,
          anyOf: raw.anyOf,
          allOf: raw.allOf,
          oneOf: raw.oneOf,
          not: raw.not,
          if: raw.if,
          then: raw.then,
          else: raw.else,
          definitions: raw.definitions,
          extensions,
          hasExplicitData: false,
        };
      })
  )
);

/**
 * Decode a plain value (parsed YAML or JSON) into a schema node
 *
 * @param raw - Parsed document
 * @param source - Where the value came from, used in error messages
 * @throws SchemaDecodeError listing every `path: message` issue
 */
export function decodeSchema(raw: unknown, source: string): Schema {
  const result = SchemaNodeSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.errors.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  throw new SchemaDecodeError(source, issues);
}

/**
 * Parse schema text: JSON, or YAML when `source` ends in .yaml/.yml
 */
export function parseSchemaText(text: string, source: string): unknown {
  if (/\.ya?ml$/i.test(source)) {
    return parseYaml(text);
  }
  return JSON.parse(text);
}

function encodeRecord(record: Record<string, Schema> | undefined): JsonSchemaObject | undefined {
  if (!record || Object.keys(record).length === 0) {
    return undefined;
  }
  const encoded: JsonSchemaObject = {};
  for (const [name, child] of Object.entries(record)) {
    encoded[name] = toJsonSchema(child);
  }
  return encoded;
}

function encodeList(list: Schema[] | undefined): JsonSchemaObject[] | undefined {
  return list?.map(toJsonSchema);
}

/**
 * Encode a schema node as a plain JSON Schema object
 *
 * Empty strings, `false` flags, empty maps, empty type and empty `required`
 * lists are left out; vendor extensions are inlined; `hasExplicitData` and `requiredFlag` are
 * internal and never written.
 */
export function toJsonSchema(schema: Schema): JsonSchemaObject {
  const json: JsonSchemaObject = {};
  const put = (key: string, value: unknown): void => {
    if (value === undefined || value === '' || value === false) {
      return;
    }
    json[key] = value;
  };

  put('$schema', schema.$schema);
  put('$id', schema.$id);
  put('$ref', schema.$ref);
  put('title', schema.title);
  put('description', schema.description);
  if (schema.type.length > 0) {
    json.type = schema.type.length === 1 ? schema.type[0] : [...schema.type];
  }
  put('deprecated', schema.deprecated);
  put('readOnly', schema.readOnly);
  put('writeOnly', schema.writeOnly);
  // A literal `false`/`""` default is meaningful, so bypass put()
  if (schema.default !== undefined) {
    json.default = schema.default;
  }
  put('examples', schema.examples);
  if (schema.const !== undefined) {
    json.const = schema.const;
  }
  put('enum', schema.enum);
  put('minimum', schema.minimum);
  put('maximum', schema.maximum);
  put('exclusiveMinimum', schema.exclusiveMinimum);
  put('exclusiveMaximum', schema.exclusiveMaximum);
  put('multipleOf', schema.multipleOf);
  put('pattern', schema.pattern);
  put('format', schema.format);
  put('minLength', schema.minLength);
  put('maxLength', schema.maxLength);
  put('items', schema.items && toJsonSchema(schema.items));
  put('minItems', schema.minItems);
  put('maxItems', schema.maxItems);
  put('uniqueItems', schema.uniqueItems);
  put('properties', encodeRecord(schema.properties));
  put('patternProperties', encodeRecord(schema.patternProperties));
  if (schema.additionalProperties !== undefined) {
    json.additionalProperties =
      typeof schema.additionalProperties === 'boolean'
        ? schema.additionalProperties
        : toJsonSchema(schema.additionalProperties);
  }
  if (schema.required.length > 0) {
    json.required = [...schema.required];
  }
  put('anyOf', encodeList(schema.anyOf));
  put('allOf', encodeList(schema.allOf));
  put('oneOf', encodeList(schema.oneOf));
  put('not', schema.not && toJsonSchema(schema.not));
  put('if', schema.if && toJsonSchema(schema.if));
  put('then', schema.then && toJsonSchema(schema.then));
  put('else', schema.else && toJsonSchema(schema.else));
  put('definitions', encodeRecord(schema.definitions));

  for (const [key, value] of Object.entries(schema.extensions)) {
    json[key] = value;
  }

  return json;
}

/**
 * Serialize a schema document with two-space indentation
 */
export function formatSchema(schema: Schema, options: { appendNewline?: boolean } = {}): string {
  const text = JSON.stringify(toJsonSchema(schema), null, 2);
  return options.appendNewline ? `${text}\n` : text;
}
