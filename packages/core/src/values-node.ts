/**
 * Values document model
 *
 * Adapts a YAML values file (parsed with `yaml`) into a small node graph that
 * keeps what inference needs: the native tag of every node and the head
 * comment of every mapping key.
 */

import {
  isAlias,
  isMap,
  isScalar,
  isSeq,
  LineCounter,
  parseDocument,
  type Document,
  type Node as YamlNode,
} from 'yaml';

import { ValuesStructureError } from './errors.js';

export const STR_TAG = '!!str';
export const INT_TAG = '!!int';
export const FLOAT_TAG = '!!float';
export const BOOL_TAG = '!!bool';
export const NULL_TAG = '!!null';
export const TIMESTAMP_TAG = '!!timestamp';
export const SEQ_TAG = '!!seq';
export const MAP_TAG = '!!map';

export interface ValuesDocument {
  kind: 'document';
  content: ValuesNode[];
}

export interface ValuesEntry {
  key: string;
  /** Head comment with `#` markers kept and indentation removed */
  comment: string;
  value: ValuesNode;
}

export interface ValuesMapping {
  kind: 'mapping';
  tag: string;
  entries: ValuesEntry[];
}

export interface ValuesSequence {
  kind: 'sequence';
  tag: string;
  items: ValuesNode[];
}

export interface ValuesScalar {
  kind: 'scalar';
  tag: string;
  /** Literal text: the unquoted content for strings, the source text otherwise */
  text: string;
}

export interface ValuesAlias {
  kind: 'alias';
  target: ValuesNode;
}

export type ValuesNode = ValuesMapping | ValuesSequence | ValuesScalar | ValuesAlias;

/** Follow alias nodes to the anchored node */
export function resolveAlias(node: ValuesNode): Exclude<ValuesNode, ValuesAlias> {
  let current = node;
  while (current.kind === 'alias') {
    current = current.target;
  }
  return current;
}

const CORE_TAG_PREFIX = 'tag:yaml.org,2002:';
const INTEGER_TEXT = /^[-+]?(0|[1-9][0-9]*|0o[0-7]+|0x[0-9a-fA-F]+)$/;

function shortTag(tag: string): string {
  return tag.startsWith(CORE_TAG_PREFIX) ? `!!${tag.slice(CORE_TAG_PREFIX.length)}` : tag;
}

function scalarTag(value: unknown, text: string): string {
  switch (typeof value) {
    case 'boolean':
      return BOOL_TAG;
    case 'bigint':
      return INT_TAG;
    case 'number':
      return INTEGER_TEXT.test(text) ? INT_TAG : FLOAT_TAG;
    case 'string':
      return STR_TAG;
    default:
      return value === null || value === undefined ? NULL_TAG : STR_TAG;
  }
}

class ValuesAdapter {
  private readonly converted = new Map<YamlNode, ValuesNode>();
  private readonly lines: string[];

  constructor(
    private readonly source: string,
    private readonly document: Document.Parsed,
    private readonly lineCounter: LineCounter,
    private readonly valuesPath: string
  ) {
    this.lines = source.split(/\r?\n/);
  }

  convert(node: unknown): ValuesNode {
    if (isAlias(node)) {
      const target = node.resolve(this.document);
      if (!target) {
        throw new ValuesStructureError(`${this.valuesPath}: unresolved alias *${node.source}`);
      }
      return { kind: 'alias', target: this.convert(target) };
    }

    if (isMap(node) || isSeq(node) || isScalar(node)) {
      const cached = this.converted.get(node);
      if (cached) {
        return cached;
      }
    }

    if (isMap(node)) {
      const mapping: ValuesMapping = { kind: 'mapping', tag: node.tag ? shortTag(node.tag) : MAP_TAG, entries: [] };
      this.converted.set(node, mapping);
      for (const pair of node.items) {
        const keyNode = pair.key;
        const key = isScalar(keyNode) ? String(keyNode.value) : String(keyNode);
        mapping.entries.push({
          key,
          comment: isScalar(keyNode) && keyNode.range ? this.headComment(keyNode.range[0]) : '',
          value: this.convert(pair.value),
        });
      }
      return mapping;
    }

    if (isSeq(node)) {
      const sequence: ValuesSequence = { kind: 'sequence', tag: node.tag ? shortTag(node.tag) : SEQ_TAG, items: [] };
      this.converted.set(node, sequence);
      for (const item of node.items) {
        sequence.items.push(this.convert(item));
      }
      return sequence;
    }

    if (isScalar(node)) {
      const text =
        typeof node.value === 'string'
          ? node.value
          : node.range
            ? this.source.slice(node.range[0], node.range[1])
            : String(node.value ?? '');
      const scalar: ValuesScalar = {
        kind: 'scalar',
        tag: node.tag ? shortTag(node.tag) : scalarTag(node.value, text),
        text,
      };
      this.converted.set(node, scalar);
      return scalar;
    }

    // `key:` with nothing after it
    if (node === null || node === undefined) {
      return { kind: 'scalar', tag: NULL_TAG, text: '' };
    }

    throw new ValuesStructureError(`${this.valuesPath}: unsupported YAML node`);
  }

  /**
   * Comment and blank lines directly above the key at the key's indentation
   */
  private headComment(offset: number): string {
    const { line, col } = this.lineCounter.linePos(offset);
    const keyLine = this.lines[line - 1] ?? '';
    const prefix = keyLine.slice(0, col - 1);
    if (!/^\s*(-\s+)*$/.test(prefix)) {
      return '';
    }
    const indent = keyLine.length - keyLine.trimStart().length;

    const collected: string[] = [];
    let reachedStart = true;
    for (let index = line - 2; index >= 0; index--) {
      const text = this.lines[index] ?? '';
      if (text.trim() === '') {
        collected.push('');
        continue;
      }
      const lineIndent = text.length - text.trimStart().length;
      if (lineIndent !== indent || !text.trimStart().startsWith('#')) {
        reachedStart = false;
        break;
      }
      collected.push(text.trim());
    }

    collected.reverse();
    if (reachedStart) {
      // At the top of the file, everything up to the last blank line is the document's own header
      const headerEnd = collected.lastIndexOf('');
      collected.splice(0, headerEnd + 1);
    }
    while (collected.length > 0 && collected[0] === '') {
      collected.shift();
    }
    while (collected.length > 0 && collected[collected.length - 1] === '') {
      collected.pop();
    }
    return collected.join('\n');
  }
}

/**
 * Parse a values file into the node model
 *
 * An empty document reads as an empty mapping.
 *
 * @throws ValuesStructureError for YAML syntax errors or more than one document
 */
export function parseValuesDocument(source: string, valuesPath: string): ValuesDocument {
  const lineCounter = new LineCounter();
  const document = parseDocument(source, { lineCounter });

  const [firstError] = document.errors;
  if (firstError) {
    throw new ValuesStructureError(`invalid YAML in ${valuesPath}: ${firstError.message}`);
  }

  if (document.contents === null) {
    return { kind: 'document', content: [{ kind: 'mapping', tag: MAP_TAG, entries: [] }] };
  }

  const adapter = new ValuesAdapter(source, document, lineCounter, valuesPath);
  return { kind: 'document', content: [adapter.convert(document.contents)] };
}
