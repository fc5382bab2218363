/**
 * @values-schema/core
 *
 * Schema inference and reference resolution for annotated Helm values files.
 *
 * ## Example Usage
 *
 * ```typescript
 * import { formatSchema, generateValuesSchemaFromFile } from '@values-schema/core';
 *
 * const schema = await generateValuesSchemaFromFile('charts/app/values.yaml', {
 *   resolveRemote: true,
 * });
 * await writeFile('charts/app/values.schema.json', formatSchema(schema, { appendNewline: true }));
 * ```
 *
 * @packageDocumentation
 */

// Schema tree and codec
export {
  DRAFT_07_SCHEMA,
  DEFINITIONS_REF_PREFIX,
  EXTENSION_PREFIX,
  SCHEMA_TYPES,
  cloneSchema,
  containsReference,
  createSchema,
  forEachChildSchema,
  hasType,
  isSchemaTypeName,
  type Schema,
  type SchemaTypeName,
} from './schema.js';
export { decodeSchema, formatSchema, parseSchemaText, toJsonSchema, type JsonSchemaObject } from './schema-codec.js';

// Errors
export {
  AnnotationError,
  DefinitionConflictError,
  ReferenceResolutionError,
  RemoteSchemaError,
  SchemaDecodeError,
  SchemaValidationError,
  ValuesStructureError,
  errorMessage,
  type SchemaRule,
} from './errors.js';

// Annotations
export { SCHEMA_MARKER, lastCommentParagraph, parseAnnotation, stripLegacyPrefix, type ParsedAnnotation } from './annotation.js';
export { legacyTypeToSchemaType, parseLegacyComment, type LegacyComment } from './legacy-comment.js';

// Values documents and inference
export {
  parseValuesDocument,
  resolveAlias,
  type ValuesDocument,
  type ValuesEntry,
  type ValuesMapping,
  type ValuesNode,
  type ValuesScalar,
  type ValuesSequence,
} from './values-node.js';
export {
  GLOBAL_DESCRIPTION,
  GLOBAL_KEY,
  castScalarText,
  inferDocumentSchema,
  typeFromTag,
  type InferenceContext,
} from './inference.js';

// References
export { getByPointer, JsonPointerError, parsePointer } from './json-pointer.js';
export {
  definitionNameFromUrl,
  isUrl,
  resolveRelativeFile,
  resolveSchemaRefs,
  type ResolveContext,
  type ResolveResult,
} from './resolver.js';
export { createHttpSchemaFetcher, RemoteSchemaStore, type SchemaFetcher } from './remote-store.js';
export { mergeDefinitions } from './definitions.js';

// Validation, equality, required fixup
export { assertValidSchema, checkSchemaSyntax, SUPPORTED_FORMATS, validateSchema, type ValidationResult } from './validator.js';
export { schemasEqual } from './equality.js';
export { disableRequiredProperties, fixRequiredProperties } from './required.js';

// Options and pipeline
export {
  DEFAULT_REMOTE_TIMEOUT_MS,
  NO_SKIP,
  SKIP_AUTO_GENERATION_FIELDS,
  isSkipAutoGenerationField,
  skipAutoGeneration,
  type GenerateOptions,
  type SkipAutoGeneration,
  type SkipAutoGenerationField,
} from './options.js';
export { generateValuesSchema, generateValuesSchemaFromFile, type GenerateSourceOptions } from './generator.js';
