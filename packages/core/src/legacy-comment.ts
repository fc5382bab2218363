/**
 * helm-docs comment dialect
 *
 * Reads the `# -- description` style annotations used by helm-docs so charts
 * documented for it get descriptions, defaults and types without a schema block.
 *
 * ```yaml
 * # -- (int) Number of replicas
 * # continued description
 * # @default -- 3 per zone
 * replicaCount: 3
 * ```
 */

import type { SchemaTypeName } from './schema.js';

export interface LegacyComment {
  description: string;
  /** Type written in parentheses right after `--` */
  valueType: string;
  default: string;
}

const GROUP_START = '# --';
// An optional dotted key may precede `--` (`# image.tag -- ...`)
const DESCRIPTION_LINE = /^\s*#\s*(.*)\s+--\s*(.*)$/;
const VALUE_TYPE = /^\((.*?)\)\s*(.*)$/;
const RAW_FLAG = /^\s*#\s+@raw/;
const DEFAULT_LINE = /^\s*# @default -- (.*)$/;
// helm-docs rendering hints, not part of the description
const RENDER_HINT_LINES = [/^\s*#\s+@notationType\s+--\s+/, /^\s*# @section -- /];
const CONTINUATION_LINE = /^\s*#(\s?)(.*)$/;

/**
 * Parse the raw comment lines above a key
 *
 * Only the last group starting with `# --` counts; lines before it belong to
 * other documentation.
 */
export function parseLegacyComment(lines: readonly string[]): LegacyComment {
  const result: LegacyComment = {
    description: '',
    valueType: '',
    default: '',
  };

  let groupStart = 0;
  for (const [index, line] of lines.entries()) {
    if (line.startsWith(GROUP_START)) {
      groupStart = index;
    }
  }

  let start = -1;
  let firstLine: RegExpExecArray | undefined;
  for (let index = groupStart; index < lines.length && !firstLine; index++) {
    const match = DESCRIPTION_LINE.exec(lines[index] ?? '');
    if (match) {
      start = index;
      firstLine = match;
    }
  }

  if (!firstLine) {
    return result;
  }

  result.description = firstLine[2] ?? '';

  const typed = VALUE_TYPE.exec(result.description);
  if (typed) {
    result.valueType = typed[1] ?? '';
    result.description = typed[2] ?? '';
  }

  let raw = false;
  for (const line of lines.slice(start + 1)) {
    if (!raw && RAW_FLAG.test(line)) {
      raw = true;
      continue;
    }

    const defaultMatch = DEFAULT_LINE.exec(line);
    if (defaultMatch) {
      result.default = defaultMatch[1] ?? '';
      continue;
    }

    if (RENDER_HINT_LINES.some((hint) => hint.test(line))) {
      continue;
    }

    const continuation = CONTINUATION_LINE.exec(line);
    if (continuation) {
      result.description += (raw ? '\n' : ' ') + (continuation[2] ?? '');
    }
  }

  return result;
}

const LEGACY_TYPES: Readonly<Record<string, SchemaTypeName>> = {
  int: 'integer',
  bool: 'boolean',
  float: 'number',
  list: 'array',
  map: 'object',
  string: 'string',
  object: 'object',
};

/**
 * Translate a helm-docs type name into a JSON Schema type name
 *
 * @throws Error for names helm-docs users may write but that have no schema equivalent (e.g. `tpl`)
 */
export function legacyTypeToSchemaType(valueType: string): SchemaTypeName {
  if (!Object.hasOwn(LEGACY_TYPES, valueType)) {
    throw new Error(`cannot translate helm-docs type (${valueType}) to a schema type`);
  }
  return LEGACY_TYPES[valueType];
}
