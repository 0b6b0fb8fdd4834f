/**
 * Default configuration values for trait-patterns.toml.
 *
 * @packageDocumentation
 */

import type { CheckConfig, Config, LoggingConfig, OutputConfig } from './types.js';

/**
 * Default check settings: conflicts detected, warnings reported but not fatal.
 */
export const DEFAULT_CHECK: CheckConfig = {
  detect_conflicts: true,
  warnings_as_errors: false,
};

/**
 * Default output settings.
 */
export const DEFAULT_OUTPUT: OutputConfig = {
  format: 'text',
};

/**
 * Default logging settings (debug off).
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  check: DEFAULT_CHECK,
  output: DEFAULT_OUTPUT,
  logging: DEFAULT_LOGGING,
};
