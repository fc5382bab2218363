/**
 * Reference Resolver
 *
 * Resolves `$ref`s found in annotations:
 *
 * - `#/definitions/name` is replaced by a copy of the registered definition
 * - `https://host/schema.json#/pointer` is downloaded (when remote resolution is
 *   on), registered in the root definitions and rewritten to `#/definitions/...`
 * - `./file.json#/definitions/name` lifts the file's definitions and becomes
 *   `#/definitions/name`; any other pointer (or none) inlines the target
 *
 * Each call works on a copy and returns the resolved schema together with the
 * definitions lifted from local files, which the caller merges into the root.
 */

import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve as resolvePath } from 'node:path';

import type { Logger } from '@values-schema/utils';

import { mergeDefinitions } from './definitions.js';
import { schemasEqual } from './equality.js';
import { errorMessage, ReferenceResolutionError, RemoteSchemaError, SchemaDecodeError } from './errors.js';
import { decodePointerFragment, getByPointer, JsonPointerError } from './json-pointer.js';
import type { RemoteSchemaStore } from './remote-store.js';
import { cloneSchema, DEFINITIONS_REF_PREFIX, type Schema } from './schema.js';
import { decodeSchema, parseSchemaText, toJsonSchema } from './schema-codec.js';

const DEFINITIONS_POINTER = '/definitions/';

/** Remote files following this naming convention get all their definitions imported */
const ALL_DEFINITIONS_FILE = '_definitions.json';

export interface ResolveContext {
  /** Root definitions registry: target of internal refs and of remote definitions */
  registry: Record<string, Schema>;
  resolveRemote: boolean;
  remoteStore: RemoteSchemaStore;
  logger: Logger;
}

export interface ResolveResult {
  schema: Schema;
  /** Definitions lifted from local files, still to be merged into the registry */
  definitions: Record<string, Schema>;
}

export function isUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Path of a file reference relative to the document it appears in
 *
 * @returns undefined when `ref` is empty, absolute, a URL, or `locator` is a URL
 */
export function resolveRelativeFile(locator: string, ref: string): string | undefined {
  if (ref === '' || isAbsolute(ref) || isUrl(locator) || /^[a-z][a-z0-9+.-]*:/i.test(ref)) {
    return undefined;
  }
  return resolvePath(dirname(locator), ref);
}

/**
 * Definition name for a whole remote document
 *
 * @example
 * ```typescript
 * definitionNameFromUrl('https://example.com/schemas/app.json'); // 'example_com_schemas_app_json'
 * ```
 */
export function definitionNameFromUrl(url: string): string {
  const name = url
    .replaceAll('https://', '')
    .replaceAll('http://', '')
    .replace(/[/.\-#:]/g, '_');
  return name.length > 0 && !/^[A-Za-z]/.test(name) ? `def_${name}` : name;
}

function definitionNameFromPointer(pointer: string): string {
  if (pointer.startsWith(DEFINITIONS_POINTER)) {
    return pointer.slice(DEFINITIONS_POINTER.length);
  }
  return pointer.replace(/^\/+|\/+$/g, '').replaceAll('/', '_');
}

function splitRef(ref: string): { base: string; fragment: string } {
  const hash = ref.indexOf('#');
  return hash < 0 ? { base: ref, fragment: '' } : { base: ref.slice(0, hash), fragment: ref.slice(hash + 1) };
}

type RefOutcome =
  | { kind: 'pending' }
  | { kind: 'rewrite'; ref: string }
  | { kind: 'inline'; schema: Schema };

interface Resolution {
  schema: Schema;
  /** Children were already handled (or must not be) */
  final: boolean;
}

const NO_LOCAL_NAMES: ReadonlySet<string> = new Set();

/**
 * Cycle and duplicate-work guards, fresh for every top-level call
 */
class ReferenceGuard {
  /** Outcome per resolved target; `pending` while the target is being resolved */
  readonly refs = new Map<string, RefOutcome>();
  /** Parsed local files */
  readonly files = new Map<string, unknown>();
  /** Local files whose definitions were already lifted */
  readonly liftedFiles = new Set<string>();
  private readonly contexts = new Map<string, WeakSet<Schema>>();

  /**
   * Mark a node as visited from a local document; false if it already was.
   * Nodes of remote documents may be revisited from different files.
   */
  enter(locator: string, node: Schema): boolean {
    if (isUrl(locator)) {
      return true;
    }
    let visited = this.contexts.get(locator);
    if (!visited) {
      visited = new WeakSet();
      this.contexts.set(locator, visited);
    }
    if (visited.has(node)) {
      return false;
    }
    visited.add(node);
    return true;
  }
}

class SchemaRefResolver {
  readonly definitions: Record<string, Schema> = {};
  private readonly guard = new ReferenceGuard();

  constructor(private readonly context: ResolveContext) {}

  async visit(node: Schema, locator: string, localNames: ReadonlySet<string>): Promise<Schema> {
    if (!this.guard.enter(locator, node)) {
      this.context.logger.debug('reference', `Schema already processed from ${locator}, skipping`);
      return node;
    }

    if (node.$ref) {
      const resolution = await this.resolveRef(node, node.$ref, locator, localNames);
      if (resolution.final) {
        return resolution.schema;
      }
    }

    await this.visitChildren(node, locator, localNames);

    if (node.definitions && !isUrl(locator)) {
      mergeDefinitions(this.definitions, node.definitions);
      node.definitions = undefined;
    }
    return node;
  }

  private async visitChildren(node: Schema, locator: string, localNames: ReadonlySet<string>): Promise<void> {
    const visitRecord = async (record: Record<string, Schema> | undefined): Promise<void> => {
      if (!record) {
        return;
      }
      for (const [name, child] of Object.entries(record)) {
        record[name] = await this.visit(child, locator, localNames);
      }
    };
    const visitList = async (list: Schema[] | undefined): Promise<void> => {
      if (!list) {
        return;
      }
      for (const [index, child] of list.entries()) {
        list[index] = await this.visit(child, locator, localNames);
      }
    };

    await visitRecord(node.properties);
    await visitRecord(node.definitions);
    await visitRecord(node.patternProperties);
    if (node.items) {
      node.items = await this.visit(node.items, locator, localNames);
    }
    if (typeof node.additionalProperties === 'object') {
      node.additionalProperties = await this.visit(node.additionalProperties, locator, localNames);
    }
    if (node.if) {
      node.if = await this.visit(node.if, locator, localNames);
    }
    if (node.then) {
      node.then = await this.visit(node.then, locator, localNames);
    }
    if (node.else) {
      node.else = await this.visit(node.else, locator, localNames);
    }
    if (node.not) {
      node.not = await this.visit(node.not, locator, localNames);
    }
    await visitList(node.anyOf);
    await visitList(node.allOf);
    await visitList(node.oneOf);
  }

  private async resolveRef(
    node: Schema,
    ref: string,
    locator: string,
    localNames: ReadonlySet<string>
  ): Promise<Resolution> {
    const { logger } = this.context;
    const { base, fragment } = splitRef(ref);

    if (base === '' && fragment.startsWith(DEFINITIONS_POINTER)) {
      const name = fragment.slice(DEFINITIONS_POINTER.length);
      if (localNames.has(name)) {
        // Lifted together with the file that defines it
        return { schema: node, final: true };
      }
      if (Object.hasOwn(this.context.registry, name)) {
        logger.debug('reference', `Found internal definition reference: ${name}`);
        return { schema: { ...cloneSchema(this.context.registry[name]), hasExplicitData: true }, final: true };
      }
      logger.debug('reference', `Internal definition not registered (yet): ${name}`);
      return { schema: node, final: false };
    }

    if (isUrl(locator) && base !== '' && !isUrl(base)) {
      // Relative reference inside a downloaded document
      const absolute = new URL(base, locator).href;
      if (this.context.resolveRemote) {
        return { schema: await this.resolveUrlRef(node, `${absolute}#${fragment}`, absolute, fragment), final: true };
      }
      return { schema: node, final: false };
    }

    if (this.context.resolveRemote && isUrl(base)) {
      return { schema: await this.resolveUrlRef(node, ref, base, fragment), final: true };
    }

    const filePath = resolveRelativeFile(locator, base);
    if (filePath === undefined) {
      logger.debug('reference', `Not a relative file reference, leaving as is: ${ref}`);
      return { schema: node, final: false };
    }
    return { schema: await this.resolveFileRef(node, ref, filePath, fragment), final: true };
  }

  private applyOutcome(node: Schema, outcome: RefOutcome): Schema {
    switch (outcome.kind) {
      case 'pending':
        this.context.logger.debug('reference', `Circular reference detected, skipping: ${node.$ref ?? ''}`);
        return node;
      case 'rewrite':
        return { ...node, $ref: outcome.ref, hasExplicitData: true };
      case 'inline':
        return cloneSchema(outcome.schema);
    }
  }

  private async resolveUrlRef(node: Schema, ref: string, base: string, fragment: string): Promise<Schema> {
    const { logger, registry } = this.context;

    const known = this.guard.refs.get(ref);
    if (known) {
      return this.applyOutcome(node, known);
    }
    this.guard.refs.set(ref, { kind: 'pending' });

    logger.debug('reference', `Processing URL reference: baseURL=${base}, jsonPointer=${fragment}`);
    const document = await this.loadRemoteDocument(base);
    if (!document) {
      this.guard.refs.delete(ref);
      return node;
    }

    let definition: Schema;
    let name: string;
    if (fragment === '') {
      definition = document;
      name = definitionNameFromUrl(base);
    } else {
      const pointer = decodePointerFragment(fragment);
      try {
        definition = decodeSchema(getByPointer(toJsonSchema(document), pointer), `${base}#${fragment}`);
      } catch (error) {
        if (!(error instanceof JsonPointerError || error instanceof SchemaDecodeError)) {
          throw error;
        }
        logger.warn('reference', `Failed to resolve JSON pointer ${fragment} in schema from ${base}`, error);
        this.guard.refs.delete(ref);
        return node;
      }
      definition = await this.visit(definition, base, NO_LOCAL_NAMES);
      name = definitionNameFromPointer(pointer);
    }

    const existing = Object.hasOwn(registry, name) ? registry[name] : undefined;
    if (existing) {
      if (!schemasEqual(existing, definition)) {
        logger.warn('reference', `Definition conflict for '${name}' from URL ${ref} - using existing definition`);
      }
    } else {
      logger.debug('reference', `Adding definition '${name}' to root schema`);
      registry[name] = definition;

      if (base.includes(ALL_DEFINITIONS_FILE) && document.definitions) {
        for (const [siblingName, sibling] of Object.entries(document.definitions)) {
          if (!Object.hasOwn(registry, siblingName)) {
            registry[siblingName] = sibling;
          }
        }
      }
    }

    const rewritten = `${DEFINITIONS_REF_PREFIX}${name}`;
    this.guard.refs.set(ref, { kind: 'rewrite', ref: rewritten });
    return { ...node, $ref: rewritten, hasExplicitData: true };
  }

  private async loadRemoteDocument(url: string): Promise<Schema | undefined> {
    const { remoteStore, logger } = this.context;

    const cached = remoteStore.get(url);
    if (cached) {
      logger.debug('reference', `Using cached schema for URL: ${url}`);
      return cached;
    }

    let document: Schema;
    try {
      document = await remoteStore.download(url);
    } catch (error) {
      if (!(error instanceof RemoteSchemaError)) {
        throw error;
      }
      logger.warn('reference', error.message);
      return undefined;
    }

    // Cached before its own refs are resolved so self-references terminate
    remoteStore.set(url, document);
    const resolved = await this.visit(document, url, NO_LOCAL_NAMES);
    remoteStore.set(url, resolved);
    return resolved;
  }

  private async resolveFileRef(node: Schema, ref: string, filePath: string, fragment: string): Promise<Schema> {
    const key = `${filePath}#${fragment}`;
    const known = this.guard.refs.get(key);
    if (known) {
      return this.applyOutcome(node, known);
    }
    this.guard.refs.set(key, { kind: 'pending' });

    const raw = await this.loadFile(filePath, ref);
    const full = decodeFile(raw, filePath, ref);
    const fileDefinitions = full.definitions ?? {};
    const localNames: ReadonlySet<string> = new Set(Object.keys(fileDefinitions));
    await this.liftFileDefinitions(filePath, fileDefinitions, localNames);

    const pointer = decodePointerFragment(fragment);
    if (pointer.startsWith(DEFINITIONS_POINTER)) {
      const name = pointer.slice(DEFINITIONS_POINTER.length);
      if (!localNames.has(name)) {
        this.context.logger.warn('reference', `definition '${name}' not found in ${filePath}`);
      }
      const rewritten = `${DEFINITIONS_REF_PREFIX}${name}`;
      this.guard.refs.set(key, { kind: 'rewrite', ref: rewritten });
      return { ...node, $ref: rewritten, hasExplicitData: true };
    }

    let target: Schema;
    if (pointer === '') {
      target = { ...full, definitions: undefined };
    } else {
      let pointed: unknown;
      try {
        pointed = getByPointer(raw, pointer);
      } catch (error) {
        throw new ReferenceResolutionError(ref, errorMessage(error), { cause: error });
      }
      target = decodeFile(pointed, `${filePath}#${fragment}`, ref);
    }

    const resolved = await this.visit(target, filePath, localNames);
    const inlined: Schema = { ...resolved, hasExplicitData: true };
    this.guard.refs.set(key, { kind: 'inline', schema: cloneSchema(inlined) });
    return inlined;
  }

  private async liftFileDefinitions(
    filePath: string,
    fileDefinitions: Record<string, Schema>,
    localNames: ReadonlySet<string>
  ): Promise<void> {
    if (this.guard.liftedFiles.has(filePath)) {
      return;
    }
    this.guard.liftedFiles.add(filePath);

    const resolved: Record<string, Schema> = {};
    for (const [name, definition] of Object.entries(fileDefinitions)) {
      resolved[name] = await this.visit(definition, filePath, localNames);
    }
    mergeDefinitions(this.definitions, resolved);
  }

  private async loadFile(filePath: string, ref: string): Promise<unknown> {
    if (this.guard.files.has(filePath)) {
      return this.guard.files.get(filePath);
    }

    let raw: unknown;
    try {
      raw = parseSchemaText(await readFile(filePath, 'utf8'), filePath);
    } catch (error) {
      throw new ReferenceResolutionError(ref, `cannot load ${filePath}: ${errorMessage(error)}`, { cause: error });
    }
    this.guard.files.set(filePath, raw);
    return raw;
  }
}

function decodeFile(raw: unknown, source: string, ref: string): Schema {
  try {
    return decodeSchema(raw, source);
  } catch (error) {
    throw new ReferenceResolutionError(ref, errorMessage(error), { cause: error });
  }
}

/**
 * Resolve every `$ref` reachable from `schema`
 *
 * @param schema - Annotation schema (not modified)
 * @param locator - Path of the values file (or URL) the schema was read from
 * @throws ReferenceResolutionError for unreadable local files or pointers
 * @throws DefinitionConflictError when two local files define one name differently
 */
export async function resolveSchemaRefs(
  schema: Schema,
  locator: string,
  context: ResolveContext
): Promise<ResolveResult> {
  const resolver = new SchemaRefResolver(context);
  const resolved = await resolver.visit(cloneSchema(schema), locator, NO_LOCAL_NAMES);
  return { schema: resolved, definitions: resolver.definitions };
}
