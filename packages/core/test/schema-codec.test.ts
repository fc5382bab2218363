/**
 * Tests for decoding and encoding schema nodes
 */

import { describe, it, expect } from 'vitest';

import { SchemaDecodeError } from '../src/errors.js';
import { createSchema } from '../src/schema.js';
import { decodeSchema, formatSchema, parseSchemaText, toJsonSchema } from '../src/schema-codec.js';

describe('schema codec', () => {
  describe('decodeSchema', () => {
    it('should normalize a single type name into a list', () => {
      const schema = decodeSchema({ type: 'string' }, 'test');

      expect(schema.type).toEqual(['string']);
      expect(schema.hasExplicitData).toBe(false);
    });

    it('should read YAML nulls inside a type list as the null type', () => {
      const schema = decodeSchema({ type: ['string', null] }, 'test');

      expect(schema.type).toEqual(['string', 'null']);
    });

    it('should split the required shorthand from the required list', () => {
      const flagged = decodeSchema({ required: true }, 'test');
      const listed = decodeSchema({ required: ['a', 'b'] }, 'test');

      expect(flagged.requiredFlag).toBe(true);
      expect(flagged.required).toEqual([]);
      expect(listed.requiredFlag).toBe(false);
      expect(listed.required).toEqual(['a', 'b']);
    });

    it('should accept additionalProperties as a boolean or a schema', () => {
      const closed = decodeSchema({ additionalProperties: false }, 'test');
      const typed = decodeSchema({ additionalProperties: { type: 'integer' } }, 'test');

      expect(closed.additionalProperties).toBe(false);
      expect(typed.additionalProperties).toMatchObject({ type: ['integer'] });
    });

    it('should collect x- keys as extensions and ignore other unknown keys', () => {
      const schema = decodeSchema({ type: 'string', 'x-order': 3, $comment: 'ignored' }, 'test');

      expect(schema.extensions).toEqual({ 'x-order': 3 });
      expect(toJsonSchema(schema)).toEqual({ type: 'string', 'x-order': 3 });
    });

    it('should decode nested schemas recursively', () => {
      const schema = decodeSchema(
        {
          type: 'object',
          properties: { name: { type: 'string', minLength: 1 } },
          anyOf: [{ required: ['name'] }],
        },
        'test'
      );

      expect(schema.properties?.name.minLength).toBe(1);
      expect(schema.anyOf?.[0].required).toEqual(['name']);
    });

    it('should treat null-valued keys as unset', () => {
      const schema = decodeSchema({ title: null, default: null }, 'test');

      expect(schema.title).toBeUndefined();
      expect(schema.default).toBeUndefined();
    });

    it('should report invalid fields with their path', () => {
      expect(() => decodeSchema({ minimum: 'one' }, 'values.yaml')).toThrow(SchemaDecodeError);
      expect(() => decodeSchema({ minimum: 'one' }, 'values.yaml')).toThrow(
        'invalid schema in values.yaml: minimum: Expected number, received string'
      );
      expect(() => decodeSchema({ properties: { a: { maxLength: 1.5 } } }, 'values.yaml')).toThrow(
        'properties.a.maxLength'
      );
    });

    it('should reject non-object schemas', () => {
      expect(() => decodeSchema('string', 'annotation')).toThrow('invalid schema in annotation');
    });
  });

  describe('toJsonSchema', () => {
    it('should leave out internal fields and empty values', () => {
      const schema = createSchema('string');
      schema.hasExplicitData = true;
      schema.title = '';
      schema.requiredFlag = true;

      expect(toJsonSchema(schema)).toEqual({ type: 'string' });
    });

    it('should keep falsy defaults and consts', () => {
      const schema = createSchema();
      schema.default = false;
      const constant = createSchema();
      constant.const = '';

      expect(toJsonSchema(schema)).toEqual({ default: false });
      expect(toJsonSchema(constant)).toEqual({ const: '' });
    });

    it('should write type unions as lists', () => {
      const schema = decodeSchema({ type: ['string', 'null'] }, 'test');

      expect(toJsonSchema(schema).type).toEqual(['string', 'null']);
    });

    it('should keep property order', () => {
      const schema = decodeSchema({ properties: { zeta: {}, alpha: {} } }, 'test');

      expect(JSON.stringify(toJsonSchema(schema))).toBe('{"properties":{"zeta":{},"alpha":{}}}');
    });
  });

  describe('formatSchema', () => {
    it('should indent with two spaces and append a newline on request', () => {
      const schema = createSchema('integer');

      expect(formatSchema(schema)).toBe('{\n  "type": "integer"\n}');
      expect(formatSchema(schema, { appendNewline: true })).toBe('{\n  "type": "integer"\n}\n');
    });
  });

  describe('parseSchemaText', () => {
    it('should parse YAML files by extension and JSON otherwise', () => {
      expect(parseSchemaText('type: string\n', 'schema.yaml')).toEqual({ type: 'string' });
      expect(parseSchemaText('{"type": "string"}', 'schema.json')).toEqual({ type: 'string' });
    });
  });
});
