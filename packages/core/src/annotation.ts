/**
 * Annotation Extractor
 *
 * Splits the comment above a values key into an explicit schema fragment
 * (lines between two `# @schema` markers) and free-text description.
 *
 * ```yaml
 * # @schema
 * # type: integer
 * # minimum: 1
 * # @schema
 * # Number of replicas
 * replicaCount: 3
 * ```
 */

import { parse as parseYaml } from 'yaml';

import { AnnotationError, errorMessage } from './errors.js';
import { createSchema, type Schema } from './schema.js';
import { decodeSchema } from './schema-codec.js';

export const SCHEMA_MARKER = '# @schema';

const COMMENT_PREFIX = '#';

export interface ParsedAnnotation {
  schema: Schema;
  description: string;
}

function stripCommentMarker(line: string): string {
  const content = line.startsWith(COMMENT_PREFIX) ? line.slice(COMMENT_PREFIX.length) : line;
  return content.startsWith(' ') ? content.slice(1) : content;
}

/**
 * Parse a key's head comment
 *
 * @param comment - Comment text with `#` markers, one line per source line
 * @param key - Values key the comment belongs to, used in error messages
 * @throws AnnotationError for an unclosed block or a block that is not a schema
 */
export function parseAnnotation(comment: string, key?: string): ParsedAnnotation {
  const schemaLines: string[] = [];
  const descriptionLines: string[] = [];
  let insideBlock = false;
  let explicit = false;

  if (comment !== '') {
    for (const line of comment.split('\n')) {
      if (line.trimEnd() === SCHEMA_MARKER) {
        insideBlock = !insideBlock;
        continue;
      }
      if (insideBlock) {
        schemaLines.push(stripCommentMarker(line));
        explicit = true;
      } else {
        descriptionLines.push(stripCommentMarker(line));
      }
    }
  }

  if (insideBlock) {
    throw new AnnotationError(`unclosed schema block found in comment: ${comment}`, comment, key);
  }

  const schema = decodeBlock(schemaLines.join('\n'), comment, key);
  schema.hasExplicitData = explicit;

  return { schema, description: descriptionLines.join('\n') };
}

function decodeBlock(text: string, comment: string, key: string | undefined): Schema {
  const source = key === undefined ? 'schema annotation' : `schema annotation of key ${key}`;

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new AnnotationError(`cannot parse ${source}: ${errorMessage(error)}`, comment, key);
  }

  if (raw === null || raw === undefined) {
    return createSchema();
  }

  try {
    return decodeSchema(raw, source);
  } catch (error) {
    throw new AnnotationError(errorMessage(error), comment, key);
  }
}

/**
 * Keep only the last paragraph of a comment (text after the last blank line)
 */
export function lastCommentParagraph(comment: string): string {
  const paragraphs = comment.split(/\n{2,}/);
  return paragraphs[paragraphs.length - 1] ?? '';
}

/**
 * Remove helm-docs markup from a description: `@tag` lines and leading `--`
 */
export function stripLegacyPrefix(description: string): string {
  return description
    .split('\n')
    .filter((line) => !/^\s*@\w+/.test(line))
    .map((line) => line.replace(/^--\s?/, ''))
    .join('\n');
}
