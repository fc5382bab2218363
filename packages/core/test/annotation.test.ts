/**
 * Tests for annotation block extraction
 */

import { describe, it, expect } from 'vitest';

import { lastCommentParagraph, parseAnnotation, stripLegacyPrefix } from '../src/annotation.js';
import { AnnotationError } from '../src/errors.js';

describe('annotation', () => {
  describe('parseAnnotation', () => {
    it('should split the schema block from the description', () => {
      const comment = ['# @schema', '# type: integer', '# minimum: 1', '# @schema', '# Number of replicas'].join('\n');

      const { schema, description } = parseAnnotation(comment, 'replicaCount');

      expect(schema.type).toEqual(['integer']);
      expect(schema.minimum).toBe(1);
      expect(schema.hasExplicitData).toBe(true);
      expect(description).toBe('Number of replicas');
    });

    it('should keep description lines on both sides of the block in order', () => {
      const comment = ['# first', '# @schema', '# type: string', '# @schema', '# second'].join('\n');

      expect(parseAnnotation(comment).description).toBe('first\nsecond');
    });

    it('should strip only one space after the comment marker', () => {
      const comment = ['# @schema', '# properties:', '#   name:', '#     type: string', '# @schema'].join('\n');

      const { schema } = parseAnnotation(comment);

      expect(schema.properties?.name.type).toEqual(['string']);
    });

    it('should return an empty node without explicit data for plain comments', () => {
      const { schema, description } = parseAnnotation('# just text');

      expect(schema.type).toEqual([]);
      expect(schema.hasExplicitData).toBe(false);
      expect(description).toBe('just text');
    });

    it('should handle an empty comment', () => {
      const { schema, description } = parseAnnotation('');

      expect(schema.hasExplicitData).toBe(false);
      expect(description).toBe('');
    });

    it('should fail on an unclosed block naming the comment', () => {
      const comment = '# @schema\n# type: string';

      expect(() => parseAnnotation(comment, 'name')).toThrow(AnnotationError);
      expect(() => parseAnnotation(comment, 'name')).toThrow(
        'unclosed schema block found in comment: # @schema\n# type: string'
      );
    });

    it('should fail when the block is not valid YAML', () => {
      const comment = ['# @schema', '# type: [string', '# @schema'].join('\n');

      expect(() => parseAnnotation(comment, 'name')).toThrow('cannot parse schema annotation of key name');
    });

    it('should fail when the block does not decode into a schema', () => {
      const comment = ['# @schema', '# minLength: many', '# @schema'].join('\n');

      expect(() => parseAnnotation(comment, 'name')).toThrow(AnnotationError);
    });

    it('should collect vendor extensions', () => {
      const comment = ['# @schema', '# x-ui-widget: slider', '# @schema'].join('\n');

      expect(parseAnnotation(comment).schema.extensions).toEqual({ 'x-ui-widget': 'slider' });
    });
  });

  describe('lastCommentParagraph', () => {
    it('should keep text after the last blank line', () => {
      expect(lastCommentParagraph('# header\n\n# section\n\n\n# key doc')).toBe('# key doc');
    });

    it('should return single paragraphs unchanged', () => {
      expect(lastCommentParagraph('# a\n# b')).toBe('# a\n# b');
    });
  });

  describe('stripLegacyPrefix', () => {
    it('should drop @tag lines and the -- prefix', () => {
      expect(stripLegacyPrefix('-- Image tag\n@default -- latest\ncontinued')).toBe('Image tag\ncontinued');
    });
  });
});
