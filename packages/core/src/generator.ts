/**
 * Generation pipeline: values text → schema
 *
 * parse → infer (annotations, refs, definitions) → required fixup →
 * optional required removal → draft-07 syntax check of the whole document.
 */

import { readFile } from 'node:fs/promises';

import { silentLogger } from '@values-schema/utils';

import { SchemaValidationError } from './errors.js';
import { inferDocumentSchema } from './inference.js';
import { DEFAULT_REMOTE_TIMEOUT_MS, NO_SKIP, type GenerateOptions } from './options.js';
import { createHttpSchemaFetcher, RemoteSchemaStore } from './remote-store.js';
import { disableRequiredProperties, fixRequiredProperties } from './required.js';
import type { Schema } from './schema.js';
import { checkSchemaSyntax } from './validator.js';
import { parseValuesDocument } from './values-node.js';

export interface GenerateSourceOptions extends GenerateOptions {
  /** Path the source was read from; relative `$ref`s resolve against it */
  valuesPath: string;
}

/**
 * Generate the schema for a values document held in memory
 *
 * @example
 * ```typescript
 * const schema = await generateValuesSchema('replicaCount: 1\n', { valuesPath: 'chart/values.yaml' });
 * console.log(formatSchema(schema, { appendNewline: true }));
 * ```
 */
export async function generateValuesSchema(source: string, options: GenerateSourceOptions): Promise<Schema> {
  const logger = options.logger ?? silentLogger;
  const remoteStore =
    options.remoteStore ??
    new RemoteSchemaStore(
      options.fetcher ?? createHttpSchemaFetcher({ timeoutMs: options.remoteTimeoutMs ?? DEFAULT_REMOTE_TIMEOUT_MS }),
      logger
    );

  logger.debug('values', `Parsing ${options.valuesPath}`);
  const document = parseValuesDocument(source, options.valuesPath);

  const schema = await inferDocumentSchema(document, {
    valuesPath: options.valuesPath,
    keepFullComment: options.keepFullComment ?? false,
    helmDocsCompatibilityMode: options.helmDocsCompatibilityMode ?? false,
    keepHelmDocsPrefix: options.keepHelmDocsPrefix ?? false,
    skipGlobal: options.skipGlobal ?? false,
    resolveRemote: options.resolveRemote ?? false,
    skip: options.skipAutoGeneration ?? NO_SKIP,
    registry: {},
    remoteStore,
    logger,
  });

  fixRequiredProperties(schema);
  if (options.disableRequired) {
    disableRequiredProperties(schema);
  }

  const syntax = checkSchemaSyntax(schema);
  if (!syntax.success) {
    throw new SchemaValidationError(syntax.error.rule, `${options.valuesPath}: ${syntax.error.message}`);
  }

  logger.debug('validation', `Schema for ${options.valuesPath} passed the draft-07 syntax check`);
  return schema;
}

/**
 * Read a values file and generate its schema
 */
export async function generateValuesSchemaFromFile(valuesPath: string, options: GenerateOptions = {}): Promise<Schema> {
  const source = await readFile(valuesPath, 'utf8');
  return generateValuesSchema(source, { ...options, valuesPath });
}
