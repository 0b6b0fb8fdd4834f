import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  VERSION,
  HttpTrait,
  Topic,
  UriPattern,
  parseHostPrefix,
  parseModel,
  parseSegment,
} from './index.js';

describe('trait-patterns', () => {
  describe('VERSION', () => {
    it('should be defined and follow semver format', () => {
      expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
    });

    it('should match package version', () => {
      expect(VERSION).toBe('0.1.0');
    });
  });

  describe('public exports', () => {
    it('should expose every dialect from the package root', () => {
      expect(parseSegment('{id}').success).toBe(true);
      expect(parseHostPrefix('{region}.api').success).toBe(true);
      expect(UriPattern.parse('/items/{id}').success).toBe(true);
      expect(Topic.parse('devices/{id}', 'publish').success).toBe(true);
      expect(HttpTrait.create({ method: 'GET', uri: '/items' }).success).toBe(true);
    });

    it('should expose the model checker', () => {
      const model = parseModel('version = "1.0"\n[operations]\n', 'empty.toml');
      expect(model.valid).toBe(true);
      expect(model.operations).toEqual([]);
    });
  });

  describe('property-based tests', () => {
    it('single-literal URIs always parse', () => {
      fc.assert(
        fc.property(fc.stringMatching(/^[a-z0-9-]{1,12}$/), (word) => {
          expect(UriPattern.parse(`/${word}`).success).toBe(true);
        })
      );
    });
  });
});
