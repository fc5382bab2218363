/**
 * Inference Engine
 *
 * Walks a values document and builds its schema. For every key the explicit
 * annotation wins; whatever it leaves open (type, title, description, default,
 * required, additionalProperties) is inferred from the value unless the skip
 * configuration says otherwise.
 */

import type { Logger } from '@values-schema/utils';

import { lastCommentParagraph, parseAnnotation, stripLegacyPrefix } from './annotation.js';
import { mergeDefinitions } from './definitions.js';
import { errorMessage, ValuesStructureError } from './errors.js';
import { legacyTypeToSchemaType, parseLegacyComment } from './legacy-comment.js';
import type { SkipAutoGeneration } from './options.js';
import type { RemoteSchemaStore } from './remote-store.js';
import { fixRequiredProperties } from './required.js';
import { resolveSchemaRefs } from './resolver.js';
import {
  containsReference,
  createSchema,
  DRAFT_07_SCHEMA,
  hasEntries,
  type Schema,
  type SchemaTypeName,
} from './schema.js';
import { assertValidSchema } from './validator.js';
import {
  BOOL_TAG,
  FLOAT_TAG,
  INT_TAG,
  MAP_TAG,
  NULL_TAG,
  resolveAlias,
  SEQ_TAG,
  STR_TAG,
  TIMESTAMP_TAG,
  type ValuesDocument,
  type ValuesEntry,
  type ValuesMapping,
  type ValuesNode,
  type ValuesSequence,
} from './values-node.js';

export const GLOBAL_KEY = 'global';
export const GLOBAL_DESCRIPTION =
  'Global values are values that can be accessed from any chart or subchart by exactly the same name.';

export interface InferenceContext {
  /** Path of the values file; base for relative `$ref`s */
  valuesPath: string;
  keepFullComment: boolean;
  helmDocsCompatibilityMode: boolean;
  keepHelmDocsPrefix: boolean;
  skipGlobal: boolean;
  resolveRemote: boolean;
  skip: SkipAutoGeneration;
  /** Root definitions registry, shared by every key of the document */
  registry: Record<string, Schema>;
  remoteStore: RemoteSchemaStore;
  logger: Logger;
}

const TAG_TYPES: Readonly<Record<string, SchemaTypeName>> = {
  [NULL_TAG]: 'null',
  [BOOL_TAG]: 'boolean',
  [STR_TAG]: 'string',
  [INT_TAG]: 'integer',
  [FLOAT_TAG]: 'number',
  [TIMESTAMP_TAG]: 'string',
  [SEQ_TAG]: 'array',
  [MAP_TAG]: 'object',
};

/**
 * Schema type of a YAML tag
 *
 * @throws ValuesStructureError for custom tags
 */
export function typeFromTag(tag: string): SchemaTypeName {
  if (!Object.hasOwn(TAG_TYPES, tag)) {
    throw new ValuesStructureError(`unsupported yaml tag found: ${tag}`, tag);
  }
  return TAG_TYPES[tag];
}

const INTEGER_LITERAL = /^[-+]?[0-9]+$/;
const FLOAT_LITERAL = /^[-+]?([0-9]+\.?[0-9]*|\.[0-9]+)([eE][-+]?[0-9]+)?$/;
const NULL_LITERAL = /^(~|null|Null|NULL)?$/;

/**
 * Best-effort conversion of a scalar's literal text to the first matching type
 *
 * Text that fits none of the types is returned unchanged.
 */
export function castScalarText(text: string, types: readonly string[]): unknown {
  for (const type of types) {
    switch (type) {
      case 'boolean':
        if (text === 'true') {
          return true;
        }
        if (text === 'false') {
          return false;
        }
        break;
      case 'integer':
        if (INTEGER_LITERAL.test(text) && Number.isSafeInteger(Number(text))) {
          return Number(text);
        }
        break;
      case 'number':
        if (FLOAT_LITERAL.test(text)) {
          return Number(text);
        }
        break;
      case 'null':
        if (NULL_LITERAL.test(text)) {
          return null;
        }
        break;
    }
  }
  return text;
}

function matchesAnyPattern(key: string, patterns: readonly string[], logger: Logger): boolean {
  return patterns.some((pattern) => {
    try {
      return new RegExp(pattern, 'u').test(key);
    } catch {
      logger.debug('values', `Ignoring invalid patternProperties regex '${pattern}'`);
      return false;
    }
  });
}

class SchemaInference {
  constructor(private readonly context: InferenceContext) {}

  async inferDocument(document: ValuesDocument): Promise<Schema> {
    const { skip, skipGlobal, registry } = this.context;

    if (document.content.length !== 1) {
      throw new ValuesStructureError(
        `${this.context.valuesPath}: expected exactly one YAML document node, found ${document.content.length}`
      );
    }

    const root = createSchema('object');
    root.$schema = DRAFT_07_SCHEMA;

    const content = resolveAlias(document.content[0]);
    root.properties = content.kind === 'mapping' ? await this.inferProperties(content, root.required) : {};

    if (!Object.hasOwn(root.properties, GLOBAL_KEY) && !skipGlobal) {
      const global = createSchema('object');
      if (!skip.title) {
        global.title = GLOBAL_KEY;
      }
      if (!skip.description) {
        global.description = GLOBAL_DESCRIPTION;
      }
      root.properties[GLOBAL_KEY] = global;
    }

    if (!skip.additionalProperties) {
      root.additionalProperties = false;
    }

    if (hasEntries(registry)) {
      root.definitions = registry;
    }
    return root;
  }

  /**
   * Schemas for every key of a mapping, in source order
   *
   * @param parentRequired - Receives the keys that are required
   */
  async inferProperties(mapping: ValuesMapping, parentRequired: string[]): Promise<Record<string, Schema>> {
    const properties: Record<string, Schema> = {};
    for (const entry of mapping.entries) {
      properties[entry.key] = await this.inferEntry(entry, parentRequired);
    }
    return properties;
  }

  private async inferEntry(entry: ValuesEntry, parentRequired: string[]): Promise<Schema> {
    const { skip, logger } = this.context;
    const value = resolveAlias(entry.value);

    const annotated = parseAnnotation(
      this.context.keepFullComment ? entry.comment : lastCommentParagraph(entry.comment),
      entry.key
    );
    let schema = annotated.schema;
    let description = annotated.description;

    if (this.context.helmDocsCompatibilityMode) {
      this.applyLegacyComment(schema, entry);
    }

    if (!this.context.keepHelmDocsPrefix) {
      description = stripLegacyPrefix(description);
    }

    if (containsReference(schema) || hasEntries(schema.patternProperties) || hasEntries(schema.definitions)) {
      schema = await this.resolveReferences(schema);
    }

    if (schema.hasExplicitData) {
      assertValidSchema(schema, entry.key);
    } else if (!skip.type) {
      schema.type = [typeFromTag(value.tag)];
    }

    if (schema.$ref) {
      return schema;
    }

    if (schema.requiredFlag || (schema.required.length === 0 && !skip.required && !schema.hasExplicitData)) {
      if (!parentRequired.includes(entry.key)) {
        parentRequired.push(entry.key);
      }
    }

    if (!skip.additionalProperties && value.kind === 'mapping' && schema.additionalProperties === undefined) {
      schema.additionalProperties = false;
    }
    if (!schema.title && !skip.title) {
      schema.title = entry.key;
    }
    if (!schema.description && !skip.description) {
      schema.description = description;
    }
    if (!skip.default && schema.default === undefined && value.kind === 'scalar') {
      schema.default = castScalarText(value.text, schema.type);
    }

    if (value.kind === 'mapping' && !schema.properties) {
      const generated = await this.inferProperties(value, schema.required);
      const patterns = Object.keys(schema.patternProperties ?? {});
      const properties: Record<string, Schema> = {};
      // Keys covered by patternProperties get no property schema but stay required
      for (const [key, property] of Object.entries(generated)) {
        if (!matchesAnyPattern(key, patterns, logger)) {
          properties[key] = property;
        }
      }
      schema.properties = properties;
    } else if (value.kind === 'sequence' && !schema.items) {
      schema.items = await this.inferSequenceItems(value);
      // Item schemas may carry the `required: true` shorthand
      fixRequiredProperties(schema);
    }

    return schema;
  }

  private applyLegacyComment(schema: Schema, entry: ValuesEntry): void {
    const legacy = parseLegacyComment(entry.comment.split('\n'));

    if (legacy.default !== '') {
      schema.hasExplicitData = true;
      schema.default ??= legacy.default;
    }
    if (legacy.description !== '') {
      schema.hasExplicitData = true;
      schema.description ||= legacy.description;
    }
    if (legacy.valueType !== '') {
      try {
        const type = legacyTypeToSchemaType(legacy.valueType);
        schema.hasExplicitData = true;
        if (schema.type.length === 0) {
          schema.type = [type];
        }
      } catch (error) {
        this.context.logger.warn(
          'annotation',
          `key ${entry.key}: ${errorMessage(error)}`
        );
      }
    }
  }

  private async resolveReferences(schema: Schema): Promise<Schema> {
    const { valuesPath, registry, resolveRemote, remoteStore, logger } = this.context;
    const { schema: resolved, definitions } = await resolveSchemaRefs(schema, valuesPath, {
      registry,
      resolveRemote,
      remoteStore,
      logger,
    });
    mergeDefinitions(registry, definitions);
    resolved.definitions = undefined;
    return resolved;
  }

  /**
   * `anyOf` over the elements of a sequence
   */
  private async inferSequenceItems(sequence: ValuesSequence): Promise<Schema> {
    const items = createSchema();
    const members: Schema[] = [];
    for (const item of sequence.items) {
      members.push(await this.inferItem(item));
    }
    if (members.length > 0) {
      items.anyOf = members;
    }
    return items;
  }

  private async inferItem(node: ValuesNode): Promise<Schema> {
    const item = resolveAlias(node);

    switch (item.kind) {
      case 'scalar':
        return createSchema(typeFromTag(item.tag));
      case 'sequence': {
        const schema = createSchema('array');
        schema.items = await this.inferSequenceItems(item);
        return schema;
      }
      case 'mapping': {
        const schema = createSchema('object');
        const required: string[] = [];
        schema.properties = await this.inferProperties(item, required);
        schema.required.push(...required);
        if (!this.context.skip.additionalProperties) {
          schema.additionalProperties = false;
        }
        return schema;
      }
    }
  }
}

/**
 * Build the schema of a whole values document
 *
 * @throws ValuesStructureError, AnnotationError, SchemaValidationError,
 *   ReferenceResolutionError or DefinitionConflictError; nothing is returned on failure
 */
export async function inferDocumentSchema(document: ValuesDocument, context: InferenceContext): Promise<Schema> {
  return new SchemaInference(context).inferDocument(document);
}
