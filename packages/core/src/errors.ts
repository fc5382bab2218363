/**
 * Error types raised by the schema engine
 *
 * Every failure that must abort a run is one of these classes, so a single
 * boundary (the CLI command) can report it and pick an exit code.
 */

/**
 * Values document has an unexpected shape, invalid YAML, or an unsupported tag
 */
export class ValuesStructureError extends Error {
  public readonly tag: string | undefined;

  constructor(message: string, tag?: string) {
    super(message);
    this.name = 'ValuesStructureError';
    this.tag = tag;
  }
}

/**
 * A key's comment holds an annotation block that cannot be read
 */
export class AnnotationError extends Error {
  public readonly comment: string;
  public readonly key: string | undefined;

  constructor(message: string, comment: string, key?: string) {
    super(message);
    this.name = 'AnnotationError';
    this.comment = comment;
    this.key = key;
  }
}

/**
 * A schema fragment does not decode into a schema tree
 */
export class SchemaDecodeError extends Error {
  public readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`invalid schema in ${source}: ${issues.join('; ')}`);
    this.name = 'SchemaDecodeError';
    this.issues = issues;
  }
}

export type SchemaRule =
  | 'syntax'
  | 'type'
  | 'const-type'
  | 'enum-type'
  | 'numeric-type'
  | 'multiple-of'
  | 'minimum-exclusive'
  | 'maximum-exclusive'
  | 'format-type'
  | 'format-unsupported'
  | 'pattern-type'
  | 'format-pattern'
  | 'length-range'
  | 'items-type'
  | 'items-schema'
  | 'item-count-type'
  | 'item-count-range';

/**
 * A schema violates one of the cross-field rules (or is not valid draft-07)
 */
export class SchemaValidationError extends Error {
  public readonly rule: SchemaRule;
  public readonly key: string | undefined;

  constructor(rule: SchemaRule, message: string, key?: string) {
    super(key === undefined ? message : `Error while validating jsonschema of key ${key}: ${message}`);
    this.name = 'SchemaValidationError';
    this.rule = rule;
    this.key = key;
  }

  /** Same rule and message, attributed to a values key */
  forKey(key: string): SchemaValidationError {
    return new SchemaValidationError(this.rule, this.message, key);
  }
}

/**
 * Two different schemas were registered under one definition name
 */
export class DefinitionConflictError extends Error {
  public readonly definition: string;

  constructor(definition: string) {
    super(`definition conflict: '${definition}' has different definitions in multiple schema files`);
    this.name = 'DefinitionConflictError';
    this.definition = definition;
  }
}

/**
 * A local `$ref` points at a file or fragment that cannot be loaded
 */
export class ReferenceResolutionError extends Error {
  public readonly ref: string;

  constructor(ref: string, message: string, options?: { cause?: unknown }) {
    super(`cannot resolve $ref '${ref}': ${message}`, options);
    this.name = 'ReferenceResolutionError';
    this.ref = ref;
  }
}

/**
 * Downloading or decoding a remote schema failed (recoverable, logged by the resolver)
 */
export class RemoteSchemaError extends Error {
  public readonly url: string;
  public readonly status: number | undefined;

  constructor(url: string, message: string, status?: number) {
    super(`Failed to download schema from ${url}: ${message}`);
    this.name = 'RemoteSchemaError';
    this.url = url;
    this.status = status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
