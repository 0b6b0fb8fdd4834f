import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  compareSegments,
  createSegment,
  isGreedyLabel,
  isLabel,
  parseSegment,
  segmentEquals,
} from './segment.js';
import { unwrapPattern } from './errors.js';
import type { PatternResult, Segment } from './types.js';

function errorOf(result: PatternResult<Segment>) {
  if (result.success) {
    throw new Error(`expected failure, got segment ${result.value.text}`);
  }
  return result.error;
}

const labelName = fc.stringMatching(/^[a-zA-Z0-9_]{1,16}$/);

describe('segment', () => {
  describe('parseSegment', () => {
    it('should parse literals', () => {
      const segment = unwrapPattern(parseSegment('forecast'));
      expect(segment).toEqual({ kind: 'literal', content: 'forecast', text: 'forecast' });
    });

    it('should parse labels', () => {
      const segment = unwrapPattern(parseSegment('{city}'));
      expect(segment).toEqual({ kind: 'label', content: 'city', text: '{city}' });
    });

    it('should parse greedy labels', () => {
      const segment = unwrapPattern(parseSegment('{key+}'));
      expect(segment).toEqual({ kind: 'greedy_label', content: 'key', text: '{key+}' });
    });

    it('should return frozen segments', () => {
      expect(Object.isFrozen(unwrapPattern(parseSegment('{id}')))).toBe(true);
    });

    it('should reject empty literals', () => {
      const error = errorOf(parseSegment('', '/a//b'));
      expect(error.kind).toBe('empty_segment');
      expect(error.message).toBe('Segments must not be empty. Found in pattern `/a//b`');
    });

    it('should reject empty labels', () => {
      expect(errorOf(parseSegment('{}')).message).toBe('Empty label declaration in pattern `{}`');
      expect(errorOf(parseSegment('{+}')).kind).toBe('empty_segment');
    });

    it('should reject invalid label names', () => {
      const error = errorOf(parseSegment('{a-b}'));
      expect(error.kind).toBe('invalid_label_name');
      expect(error.message).toBe(
        "Invalid label name in pattern: 'a-b'. Labels must satisfy the following regular expression: ^[a-zA-Z0-9_]+$"
      );
    });

    it('should treat a lone brace as a literal with an illegal character', () => {
      const open = errorOf(parseSegment('{'));
      expect(open.kind).toBe('illegal_literal_character');
      expect(open.character).toBe('{');
      expect(open.message).toBe('Literal segments must not contain `{` or `}` characters. Found segment `{`');

      expect(errorOf(parseSegment('a}b')).character).toBe('}');
    });

    it('should reject labels that do not span the whole token', () => {
      const error = errorOf(parseSegment('x{id}'));
      expect(error.kind).toBe('illegal_literal_character');
      expect(error.character).toBe('{');
    });

    it('should carry the enclosing source on errors', () => {
      const error = errorOf(parseSegment('{bad name}', '/items/{bad name}'));
      expect(error.source).toBe('/items/{bad name}');
      expect(error.content).toBe('bad name');
    });
  });

  describe('createSegment', () => {
    it('should render text from kind and content', () => {
      expect(unwrapPattern(createSegment('greedy_label', 'rest')).text).toBe('{rest+}');
      expect(unwrapPattern(createSegment('label', 'rest')).text).toBe('{rest}');
      expect(unwrapPattern(createSegment('literal', 'rest')).text).toBe('rest');
    });

    it('should validate label names for greedy labels too', () => {
      expect(errorOf(createSegment('greedy_label', 'a.b')).kind).toBe('invalid_label_name');
    });
  });

  describe('predicates and ordering', () => {
    it('should classify labels', () => {
      const literal = unwrapPattern(parseSegment('a'));
      const label = unwrapPattern(parseSegment('{a}'));
      const greedy = unwrapPattern(parseSegment('{a+}'));

      expect([isLabel(literal), isLabel(label), isLabel(greedy)]).toEqual([false, true, true]);
      expect([isGreedyLabel(literal), isGreedyLabel(label), isGreedyLabel(greedy)]).toEqual([
        false,
        false,
        true,
      ]);
    });

    it('should compare segments by their text', () => {
      const a = unwrapPattern(parseSegment('a'));
      const b = unwrapPattern(parseSegment('b'));

      expect(compareSegments(a, b)).toBe(-1);
      expect(compareSegments(b, a)).toBe(1);
      expect(compareSegments(a, unwrapPattern(parseSegment('a')))).toBe(0);
      expect(segmentEquals(a, b)).toBe(false);
    });

    it('should distinguish a label from a literal with the same content', () => {
      const literal = unwrapPattern(parseSegment('id'));
      const label = unwrapPattern(parseSegment('{id}'));
      expect(segmentEquals(literal, label)).toBe(false);
    });
  });

  describe('Property-based tests', () => {
    it('valid label names parse as labels whose text is the token', () => {
      fc.assert(
        fc.property(labelName, fc.boolean(), (name, greedy) => {
          const token = greedy ? `{${name}+}` : `{${name}}`;
          const segment = unwrapPattern(parseSegment(token));
          expect(segment.kind).toBe(greedy ? 'greedy_label' : 'label');
          expect(segment.content).toBe(name);
          expect(segment.text).toBe(token);
        })
      );
    });

    it('brace-free non-empty tokens parse as literals', () => {
      fc.assert(
        fc.property(
          fc.string({ minLength: 1 }).filter((s) => !s.includes('{') && !s.includes('}')),
          (token) => {
            const segment = unwrapPattern(parseSegment(token));
            expect(segment.kind).toBe('literal');
            expect(segment.text).toBe(token);
          }
        )
      );
    });
  });
});
