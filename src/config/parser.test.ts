import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  ConfigParseError,
  DEFAULT_CONFIG,
  getDefaultConfig,
  isOutputFormat,
  loadConfig,
  parseConfig,
} from './index.js';

describe('Config Parser', () => {
  describe('parseConfig', () => {
    describe('valid TOML parsing', () => {
      it('should parse empty TOML to default config', () => {
        expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
      });

      it('should parse complete valid configuration', () => {
        const toml = `
[check]
detect_conflicts = false
warnings_as_errors = true

[output]
format = "json"

[logging]
debug = true
`;
        const config = parseConfig(toml);

        expect(config.check.detect_conflicts).toBe(false);
        expect(config.check.warnings_as_errors).toBe(true);
        expect(config.output.format).toBe('json');
        expect(config.logging.debug).toBe(true);
      });

      it('should merge partial sections with defaults', () => {
        const config = parseConfig('[check]\nwarnings_as_errors = true\n');

        expect(config.check).toEqual({ detect_conflicts: true, warnings_as_errors: true });
        expect(config.output).toEqual(DEFAULT_CONFIG.output);
        expect(config.logging).toEqual(DEFAULT_CONFIG.logging);
      });

      it('should ignore unknown sections', () => {
        expect(parseConfig('[extra]\nvalue = 1\n')).toEqual(DEFAULT_CONFIG);
      });
    });

    describe('invalid input', () => {
      it('should throw ConfigParseError for invalid TOML syntax', () => {
        expect(() => parseConfig('[check\n')).toThrow(ConfigParseError);
        expect(() => parseConfig('[check\n')).toThrow(/^Invalid TOML syntax: /);
      });

      it('should reject non-boolean check flags', () => {
        expect(() => parseConfig('[check]\ndetect_conflicts = "yes"\n')).toThrow(
          "Invalid type for 'check.detect_conflicts': expected boolean, got string"
        );
      });

      it('should reject unknown output formats', () => {
        expect(() => parseConfig('[output]\nformat = "xml"\n')).toThrow(
          "Invalid value for 'output.format': expected one of text, json, got 'xml'"
        );
      });

      it('should reject sections that are not tables', () => {
        expect(() => parseConfig('logging = 3\n')).toThrow(
          "Invalid type for 'logging': expected table, got number"
        );
      });

      it('should keep the underlying TOML error as the cause', () => {
        try {
          parseConfig('= nope');
          expect.fail('expected parseConfig to throw');
        } catch (err) {
          expect(err).toBeInstanceOf(ConfigParseError);
          expect((err as ConfigParseError).cause).toBeInstanceOf(Error);
        }
      });
    });

    describe('Property-based tests', () => {
      it('boolean settings round-trip through TOML', () => {
        fc.assert(
          fc.property(fc.boolean(), fc.boolean(), fc.boolean(), (detect, strict, debug) => {
            const config = parseConfig(
              `[check]\ndetect_conflicts = ${String(detect)}\nwarnings_as_errors = ${String(strict)}\n` +
                `[logging]\ndebug = ${String(debug)}\n`
            );
            expect(config.check.detect_conflicts).toBe(detect);
            expect(config.check.warnings_as_errors).toBe(strict);
            expect(config.logging.debug).toBe(debug);
          })
        );
      });
    });
  });

  describe('isOutputFormat', () => {
    it('should accept only text and json', () => {
      expect(isOutputFormat('text')).toBe(true);
      expect(isOutputFormat('json')).toBe(true);
      expect(isOutputFormat('JSON')).toBe(false);
      expect(isOutputFormat('')).toBe(false);
    });
  });

  describe('getDefaultConfig', () => {
    it('should return a copy of the defaults', () => {
      const config = getDefaultConfig();
      config.output.format = 'json';

      expect(DEFAULT_CONFIG.output.format).toBe('text');
      expect(getDefaultConfig()).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('loadConfig', () => {
    let tempDir: string;

    beforeAll(async () => {
      tempDir = await mkdtemp(join(tmpdir(), 'config-test-'));
    });

    afterAll(async () => {
      await rm(tempDir, { recursive: true, force: true });
    });

    it('should read and parse a config file', async () => {
      const file = join(tempDir, 'trait-patterns.toml');
      await writeFile(file, '[output]\nformat = "json"\n', 'utf-8');

      const config = await loadConfig(file);
      expect(config.output.format).toBe('json');
    });

    it('should wrap read failures in ConfigParseError', async () => {
      const file = join(tempDir, 'missing.toml');

      await expect(loadConfig(file)).rejects.toThrow(ConfigParseError);
      await expect(loadConfig(file)).rejects.toThrow(`Failed to read config file '${file}'`);
    });
  });
});
