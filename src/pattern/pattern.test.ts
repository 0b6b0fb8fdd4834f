import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Pattern, findDuplicateLabel } from './pattern.js';
import { parseSegment } from './segment.js';
import { InvalidPatternError, unwrapPattern } from './errors.js';
import type { PatternResult, Segment } from './types.js';

function segmentsOf(...tokens: string[]): Segment[] {
  return tokens.map((token) => unwrapPattern(parseSegment(token)));
}

function build(tokens: string[], allowsGreedyLabels = true): PatternResult<Pattern> {
  return Pattern.build(tokens.join('/'), segmentsOf(...tokens), allowsGreedyLabels);
}

function errorOf(result: PatternResult<Pattern>) {
  if (result.success) {
    throw new Error(`expected failure, got pattern ${result.value.toString()}`);
  }
  return result.error;
}

describe('Pattern', () => {
  describe('build', () => {
    it('should keep segments in order and expose labels', () => {
      const pattern = unwrapPattern(build(['a', '{b}', 'c', '{d+}']));

      expect(pattern.segments().map((s) => s.text)).toEqual(['a', '{b}', 'c', '{d+}']);
      expect(pattern.labels().map((s) => s.content)).toEqual(['b', 'd']);
      expect(pattern.greedyLabel()?.content).toBe('d');
      expect(pattern.allowsGreedyLabels).toBe(true);
    });

    it('should accept a pattern with no segments', () => {
      const pattern = unwrapPattern(Pattern.build('', [], true));
      expect(pattern.segments()).toEqual([]);
      expect(pattern.greedyLabel()).toBeUndefined();
    });

    it('should freeze the segment list', () => {
      const pattern = unwrapPattern(build(['a']));
      expect(Object.isFrozen(pattern.segments())).toBe(true);
    });

    it('should reject duplicate labels ignoring case', () => {
      const error = errorOf(build(['{Id}', 'x', '{id}']));
      expect(error.kind).toBe('duplicate_label');
      expect(error.message).toBe('Label `id` is defined more than once in pattern: {Id}/x/{id}');
    });

    it('should count a greedy label against labels of the same name', () => {
      expect(errorOf(build(['{a}', '{a+}'])).kind).toBe('duplicate_label');
    });

    it('should allow a literal after a greedy label', () => {
      const pattern = unwrapPattern(build(['{key+}', 'meta']));
      expect(pattern.greedyLabel()?.content).toBe('key');
    });

    it('should reject a label after a greedy label', () => {
      const error = errorOf(build(['{key+}', '{version}']));
      expect(error.kind).toBe('greedy_label_not_last');
      expect(error.message).toBe('A greedy label must be the last label in its pattern: {key+}/{version}');
    });

    it('should reject more than one greedy label', () => {
      const error = errorOf(build(['{a+}', 'x', '{b+}']));
      expect(error.kind).toBe('multiple_greedy_labels');
      expect(error.message).toBe('At most one greedy label segment may exist in a pattern: {a+}/x/{b+}');
    });

    it('should reject greedy labels where they are not allowed', () => {
      const error = errorOf(build(['a', '{b+}'], false));
      expect(error.kind).toBe('greedy_label_not_allowed');
      expect(error.message).toBe('Pattern must not contain a greedy label. Found a/{b+}');
    });

    it('should reject a hand-made literal containing a brace', () => {
      const error = errorOf(Pattern.build('a{b', [{ kind: 'literal', content: 'a{b', text: 'a{b' }], true));
      expect(error.kind).toBe('illegal_literal_character');
      expect(error.character).toBe('{');
    });

    it('should reject a hand-made label with an invalid name', () => {
      const error = errorOf(Pattern.build('{a b}', [{ kind: 'label', content: 'a b', text: '{zzz}' }], true));
      expect(error.kind).toBe('invalid_label_name');
      expect(error.content).toBe('a b');
    });

    it('should derive segment text from kind and content', () => {
      const pattern = unwrapPattern(Pattern.build('{a}', [{ kind: 'label', content: 'a', text: '{zzz}' }], true));
      expect(pattern.segments()).toEqual([{ kind: 'label', content: 'a', text: '{a}' }]);
      expect(pattern.render()).toBe('{a}');
    });

    it('should report duplicates before greedy placement', () => {
      expect(errorOf(build(['{a+}', '{a}'])).kind).toBe('duplicate_label');
    });
  });

  describe('queries', () => {
    const pattern = unwrapPattern(build(['users', '{UserId}', 'files', '{path+}']));

    it('should find labels case-insensitively', () => {
      expect(pattern.label('userid')?.content).toBe('UserId');
      expect(pattern.label('USERID')?.content).toBe('UserId');
      expect(pattern.label('users')).toBeUndefined();
    });

    it('should render with a separator', () => {
      expect(pattern.render('/')).toBe('users/{UserId}/files/{path+}');
      expect(pattern.render()).toBe('users{UserId}files{path+}');
    });

    it('should compare by source text', () => {
      const same = unwrapPattern(build(['users', '{UserId}', 'files', '{path+}']));
      const other = unwrapPattern(build(['users', '{userId}', 'files', '{path+}']));

      expect(pattern.equals(same)).toBe(true);
      expect(pattern.equals(other)).toBe(false);
      expect(pattern.toString()).toBe('users/{UserId}/files/{path+}');
    });
  });

  describe('findDuplicateLabel', () => {
    it('should return undefined for distinct labels', () => {
      expect(findDuplicateLabel([{ content: 'a' }, { content: 'b' }], 'src')).toBeUndefined();
    });

    it('should name the repeated label as written the second time', () => {
      expect(findDuplicateLabel([{ content: 'abc' }, { content: 'ABC' }], 'src')?.content).toBe('ABC');
    });
  });

  describe('unwrapPattern', () => {
    it('should throw InvalidPatternError carrying the failure', () => {
      try {
        unwrapPattern(build(['{a}', '{a}']));
        expect.fail('expected unwrapPattern to throw');
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidPatternError);
        const invalid = err as InvalidPatternError;
        expect(invalid.kind).toBe('duplicate_label');
        expect(invalid.name).toBe('InvalidPatternError');
        expect(invalid.message).toBe(invalid.patternError.message);
      }
    });
  });

  describe('Property-based tests', () => {
    const name = fc.stringMatching(/^[a-z][a-z0-9_]{0,7}$/);

    it('a label repeated in another case is always a duplicate', () => {
      fc.assert(
        fc.property(name, (label) => {
          const error = errorOf(build([`{${label}}`, 'sep', `{${label.toUpperCase()}}`]));
          expect(error.kind).toBe('duplicate_label');
        })
      );
    });

    it('rendering distinct labels reproduces the source', () => {
      fc.assert(
        fc.property(fc.uniqueArray(name, { minLength: 1, maxLength: 6 }), (labels) => {
          const tokens = labels.map((label) => `{${label}}`);
          const pattern = unwrapPattern(build(tokens));
          expect(pattern.render('/')).toBe(pattern.toString());
          expect(pattern.labels()).toHaveLength(labels.length);
        })
      );
    });
  });
});
