import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Topic, parseTopic, parseTopicOrThrow } from './topic.js';
import { InvalidPatternError } from '../pattern/errors.js';
import type { PatternResult } from '../pattern/types.js';

function errorOf(result: PatternResult<Topic>) {
  if (result.success) {
    throw new Error(`expected failure, got topic ${result.value.toString()}`);
  }
  return result.error;
}

const publish = (text: string): Topic => parseTopicOrThrow(text, 'publish');
const subscribe = (text: string): Topic => parseTopicOrThrow(text, 'subscribe');

describe('Topic', () => {
  describe('parse', () => {
    it('should parse literal and label levels', () => {
      const topic = publish('devices/{deviceId}/status');

      expect(topic.levels()).toEqual([
        { kind: 'literal', content: 'devices', text: 'devices' },
        { kind: 'label', content: 'deviceId', text: '{deviceId}' },
        { kind: 'literal', content: 'status', text: 'status' },
      ]);
      expect(topic.labels().map((level) => level.content)).toEqual(['deviceId']);
      expect(topic.label('DEVICEID')?.content).toBe('deviceId');
      expect(topic.hasWildcards()).toBe(false);
      expect(topic.direction).toBe('publish');
    });

    it('should parse wildcards in subscribe topics', () => {
      const topic = subscribe('devices/+/events/#');

      expect(topic.levels().map((level) => level.kind)).toEqual([
        'literal',
        'single_level_wildcard',
        'literal',
        'multi_level_wildcard',
      ]);
      expect(topic.hasWildcards()).toBe(true);
      expect(topic.render()).toBe('devices/+/events/#');
    });

    it('should reject wildcards in publish topics', () => {
      const error = errorOf(parseTopic('devices/+/status', 'publish'));
      expect(error.kind).toBe('illegal_wildcard');
      expect(error.message).toBe('Wildcard levels are not allowed in publish topics. Found `+` in `devices/+/status`');
    });

    it('should require the multi-level wildcard to be last', () => {
      const error = errorOf(parseTopic('devices/#/status', 'subscribe'));
      expect(error.kind).toBe('illegal_wildcard');
      expect(error.message).toBe('A multi-level wildcard must be the last level of a topic. Found `devices/#/status`');
    });

    it('should reject wildcards that share a level with other characters', () => {
      expect(errorOf(parseTopic('devices/a+/status', 'subscribe')).message).toBe(
        'Wildcards must occupy an entire topic level. Found `a+` in `devices/a+/status`'
      );
      expect(errorOf(parseTopic('devices/#x', 'subscribe')).kind).toBe('illegal_wildcard');
    });

    it('should reject labels that do not span the level', () => {
      const error = errorOf(parseTopic('devices/id-{id}', 'publish'));
      expect(error.kind).toBe('illegal_literal_character');
      expect(error.character).toBe('{');
      expect(error.message).toBe('Topic labels must span an entire level. Found `id-{id}` in `devices/id-{id}`');
    });

    it('should reject greedy labels', () => {
      const error = errorOf(parseTopic('files/{path+}', 'publish'));
      expect(error.kind).toBe('greedy_label_not_allowed');
      expect(error.message).toBe('Topic labels must not be greedy. Found `{path+}` in `files/{path+}`');
    });

    it('should reject empty levels', () => {
      expect(errorOf(parseTopic('devices//status', 'publish')).kind).toBe('empty_segment');
      expect(errorOf(parseTopic('', 'publish')).kind).toBe('empty_segment');
    });

    it('should reject duplicate labels ignoring case', () => {
      const error = errorOf(parseTopic('{id}/x/{ID}', 'publish'));
      expect(error.kind).toBe('duplicate_label');
      expect(error.message).toBe('Label `ID` is defined more than once in pattern: {id}/x/{ID}');
    });

    it('should throw from the throwing variant', () => {
      expect(() => parseTopicOrThrow('a/#', 'publish')).toThrow(InvalidPatternError);
    });
  });

  describe('matches', () => {
    it('should match labels and single-level wildcards against one level', () => {
      expect(subscribe('devices/+/status').matches('devices/abc/status')).toBe(true);
      expect(publish('devices/{id}/status').matches('devices/abc/status')).toBe(true);
      expect(subscribe('devices/+/status').matches('devices/abc/def/status')).toBe(false);
    });

    it('should match any remainder with the multi-level wildcard', () => {
      expect(subscribe('devices/#').matches('devices')).toBe(true);
      expect(subscribe('devices/#').matches('devices/a/b/c')).toBe(true);
      expect(subscribe('#').matches('anything/at/all')).toBe(true);
    });

    it('should require literals to be equal', () => {
      expect(publish('devices/status').matches('devices/state')).toBe(false);
      expect(publish('devices/status').matches('devices/status/extra')).toBe(false);
      expect(publish('devices/status').matches('devices')).toBe(false);
    });
  });

  describe('conflictsWith', () => {
    it('should conflict on identical structure', () => {
      expect(publish('a/{x}/c').conflictsWith(publish('a/{y}/c'))).toBe(true);
    });

    it('should not conflict on different literals', () => {
      expect(publish('a/b').conflictsWith(publish('a/c'))).toBe(false);
    });

    it('should not conflict when a literal meets a label', () => {
      expect(publish('a/{x}').conflictsWith(publish('a/b'))).toBe(false);
    });

    it('should conflict whenever a multi-level wildcard is reached', () => {
      expect(subscribe('a/#').conflictsWith(publish('a/b/c'))).toBe(true);
      expect(publish('x/b').conflictsWith(subscribe('a/#'))).toBe(false);
    });

    it('should not conflict on different lengths', () => {
      expect(publish('a/{x}').conflictsWith(publish('a/{x}/c'))).toBe(false);
    });
  });

  describe('equals', () => {
    it('should compare source and direction', () => {
      expect(publish('a/b').equals(publish('a/b'))).toBe(true);
      expect(publish('a/b').equals(subscribe('a/b'))).toBe(false);
      expect(publish('a/b').toString()).toBe('a/b');
    });
  });

  describe('Property-based tests', () => {
    const literal = fc.stringMatching(/^[a-z0-9]{1,8}$/);

    it('wildcards fail in publish topics and parse in subscribe topics unless `#` is not last', () => {
      fc.assert(
        fc.property(
          fc.array(literal, { minLength: 0, maxLength: 3 }),
          fc.constantFrom('+', '#'),
          fc.array(literal, { minLength: 0, maxLength: 3 }),
          (before, wildcard, after) => {
            const text = [...before, wildcard, ...after].join('/');
            expect(errorOf(parseTopic(text, 'publish')).kind).toBe('illegal_wildcard');

            const subscribed = parseTopic(text, 'subscribe');
            if (wildcard === '+' || after.length === 0) {
              expect(subscribed.success).toBe(true);
            } else {
              expect(errorOf(subscribed).kind).toBe('illegal_wildcard');
            }
          }
        )
      );
    });

    it('a literal topic matches its own text', () => {
      fc.assert(
        fc.property(fc.array(literal, { minLength: 1, maxLength: 5 }), (levels) => {
          const text = levels.join('/');
          expect(publish(text).matches(text)).toBe(true);
        })
      );
    });
  });
});
