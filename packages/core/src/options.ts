/**
 * Generation options shared by the inference engine and the pipeline
 */

import type { Logger } from '@values-schema/utils';

import type { RemoteSchemaStore, SchemaFetcher } from './remote-store.js';

/** Fields inference fills in unless told not to */
export const SKIP_AUTO_GENERATION_FIELDS = [
  'type',
  'title',
  'description',
  'required',
  'default',
  'additionalProperties',
] as const;

export type SkipAutoGenerationField = (typeof SKIP_AUTO_GENERATION_FIELDS)[number];

export type SkipAutoGeneration = Readonly<Record<SkipAutoGenerationField, boolean>>;

export const NO_SKIP: SkipAutoGeneration = {
  type: false,
  title: false,
  description: false,
  required: false,
  default: false,
  additionalProperties: false,
};

export function isSkipAutoGenerationField(name: string): name is SkipAutoGenerationField {
  return SKIP_AUTO_GENERATION_FIELDS.some((field) => field === name);
}

/**
 * Build a skip configuration from already-validated field names
 */
export function skipAutoGeneration(fields: readonly SkipAutoGenerationField[]): SkipAutoGeneration {
  const skip = { ...NO_SKIP };
  for (const field of fields) {
    skip[field] = true;
  }
  return skip;
}

export const DEFAULT_REMOTE_TIMEOUT_MS = 30_000;

export interface GenerateOptions {
  /** Keep every comment paragraph in descriptions instead of the last one */
  keepFullComment?: boolean;
  /** Also read helm-docs `# --` comments */
  helmDocsCompatibilityMode?: boolean;
  /** Keep helm-docs `--` prefixes and `@tag` lines in descriptions */
  keepHelmDocsPrefix?: boolean;
  /** Do not add the `global` property to the root */
  skipGlobal?: boolean;
  /** Download `$ref`s pointing at http(s) URLs */
  resolveRemote?: boolean;
  skipAutoGeneration?: SkipAutoGeneration;
  /** Drop every `required` list from the result */
  disableRequired?: boolean;
  remoteTimeoutMs?: number;
  logger?: Logger;
  fetcher?: SchemaFetcher;
  /** Share downloads between several values files */
  remoteStore?: RemoteSchemaStore;
}
