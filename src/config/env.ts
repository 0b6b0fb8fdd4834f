/**
 * Environment variable overrides for configuration.
 *
 * Provides support for TRAIT_PATTERNS_* environment variables to override
 * configuration values at runtime. Environment variables take precedence
 * over config file values, which take precedence over defaults.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { isOutputFormat, OUTPUT_FORMATS } from './parser.js';
import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * Applies one coerced environment value to a partial configuration.
 */
type EnvSetter = (overrides: PartialConfig, value: string, envVar: string) => void;

interface EnvVarMapping {
  readonly description: string;
  readonly type: 'boolean' | 'format';
  readonly apply: EnvSetter;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Mapping from environment variable names to config fields.
 *
 * Format: TRAIT_PATTERNS_<FIELD> maps to a field of the check, output or
 * logging section.
 */
const ENV_VAR_MAPPINGS: Record<string, EnvVarMapping> = {
  TRAIT_PATTERNS_DETECT_CONFLICTS: {
    description: 'Enable or disable cross-operation conflict checks (true/false)',
    type: 'boolean',
    apply: (overrides, value, envVar) => {
      overrides.check = { ...overrides.check, detect_conflicts: coerceToBoolean(value, envVar) };
    },
  },
  TRAIT_PATTERNS_WARNINGS_AS_ERRORS: {
    description: 'Treat warnings as errors (true/false)',
    type: 'boolean',
    apply: (overrides, value, envVar) => {
      overrides.check = { ...overrides.check, warnings_as_errors: coerceToBoolean(value, envVar) };
    },
  },
  TRAIT_PATTERNS_OUTPUT_FORMAT: {
    description: `Override the output format (${OUTPUT_FORMATS.join(', ')})`,
    type: 'format',
    apply: (overrides, value, envVar) => {
      const format = value.trim().toLowerCase();
      if (!isOutputFormat(format)) {
        throw new EnvCoercionError(
          envVar,
          value,
          'format',
          `Cannot coerce '${envVar}' value '${value}' to an output format. Expected one of: ${OUTPUT_FORMATS.join(', ')}`
        );
      }
      overrides.output = { ...overrides.output, format };
    },
  },
  TRAIT_PATTERNS_DEBUG: {
    description: 'Enable or disable debug logging (true/false)',
    type: 'boolean',
    apply: (overrides, value, envVar) => {
      overrides.logging = { ...overrides.logging, debug: coerceToBoolean(value, envVar) };
    },
  },
};

/**
 * Reads environment variables and returns configuration overrides.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @returns Partial configuration with values from environment variables.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 *
 * @example
 * ```typescript
 * const overrides = readEnvOverrides({ TRAIT_PATTERNS_OUTPUT_FORMAT: 'json' });
 * console.log(overrides.output?.format); // "json"
 * ```
 */
export function readEnvOverrides(env: EnvRecord = process.env): PartialConfig {
  const overrides: PartialConfig = {};

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    mapping.apply(overrides, value, envVar);
  }

  return overrides;
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    check: { ...base.check, ...partial.check },
    output: { ...base.output, ...partial.output },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  return mergeConfig(config, readEnvOverrides(env));
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return Object.fromEntries(
    Object.entries(ENV_VAR_MAPPINGS).map(([envVar, mapping]) => [
      envVar,
      { description: mapping.description, type: mapping.type },
    ])
  );
}
