/**
 * TOML configuration parser for trait-patterns.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { safeReadTextFile } from '../utils/safe-fs.js';
import { DEFAULT_CHECK, DEFAULT_CONFIG, DEFAULT_LOGGING, DEFAULT_OUTPUT } from './defaults.js';
import type { CheckConfig, Config, LoggingConfig, OutputConfig, OutputFormat } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/** Output formats accepted by `output.format`. */
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];

/**
 * Checks whether a string names a supported output format.
 */
export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function describeType(value: unknown): string {
  if (Array.isArray(value)) {
    return 'array';
  }
  return value === null ? 'null' : typeof value;
}

/**
 * Validates that a value is a TOML table.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The table, or undefined when the section is absent.
 * @throws ConfigParseError if value is present but not a table.
 */
function validateTable(value: unknown, fieldPath: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected table, got ${describeType(value)}`
    );
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Parses check settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the check section.
 * @returns Validated check settings merged with defaults.
 */
function parseCheck(raw: Record<string, unknown> | undefined): CheckConfig {
  const result: CheckConfig = { ...DEFAULT_CHECK };
  if (raw === undefined) {
    return result;
  }

  if ('detect_conflicts' in raw) {
    result.detect_conflicts = validateBoolean(raw.detect_conflicts, 'check.detect_conflicts');
  }
  if ('warnings_as_errors' in raw) {
    result.warnings_as_errors = validateBoolean(raw.warnings_as_errors, 'check.warnings_as_errors');
  }

  return result;
}

/**
 * Parses output settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the output section.
 * @returns Validated output settings merged with defaults.
 */
function parseOutput(raw: Record<string, unknown> | undefined): OutputConfig {
  const result: OutputConfig = { ...DEFAULT_OUTPUT };
  if (raw === undefined) {
    return result;
  }

  if ('format' in raw) {
    const format = validateString(raw.format, 'output.format');
    if (!isOutputFormat(format)) {
      throw new ConfigParseError(
        `Invalid value for 'output.format': expected one of ${OUTPUT_FORMATS.join(', ')}, got '${format}'`
      );
    }
    result.format = format;
  }

  return result;
}

/**
 * Parses logging settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the logging section.
 * @returns Validated logging settings merged with defaults.
 */
function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [check]
 * warnings_as_errors = true
 *
 * [output]
 * format = "json"
 * `);
 * console.log(config.check.warnings_as_errors); // true
 * console.log(config.output.format); // "json"
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new ConfigParseError(
      `Invalid TOML syntax: ${error instanceof Error ? error.message : String(error)}`,
      cause
    );
  }

  return {
    check: parseCheck(validateTable(parsed.check, 'check')),
    output: parseOutput(validateTable(parsed.output, 'output')),
    logging: parseLogging(validateTable(parsed.logging, 'logging')),
  };
}

/**
 * Reads and parses a configuration file.
 *
 * @param filePath - Path to the TOML file.
 * @returns Validated configuration object.
 * @throws ConfigParseError if the file cannot be read or is invalid.
 */
export async function loadConfig(filePath: string): Promise<Config> {
  let content: string;
  try {
    content = await safeReadTextFile(filePath);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new ConfigParseError(
      `Failed to read config file '${filePath}': ${error instanceof Error ? error.message : String(error)}`,
      cause
    );
  }
  return parseConfig(content);
}

/**
 * Returns a copy of the default configuration.
 *
 * @returns Default configuration object.
 */
export function getDefaultConfig(): Config {
  return {
    check: { ...DEFAULT_CONFIG.check },
    output: { ...DEFAULT_CONFIG.output },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}
