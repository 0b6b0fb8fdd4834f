/**
 * Configuration types for trait-patterns.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Output format for command results.
 */
export type OutputFormat = 'text' | 'json';

/**
 * Settings for model checks.
 */
export interface CheckConfig {
  /** Whether operations are checked against each other for conflicts. */
  detect_conflicts: boolean;
  /** Whether warnings make a model fail the check. */
  warnings_as_errors: boolean;
}

/**
 * Settings for command output.
 */
export interface OutputConfig {
  /** Format for results written to stdout. */
  format: OutputFormat;
}

/**
 * Settings for diagnostic logging.
 */
export interface LoggingConfig {
  /** Whether debug entries are written to stderr. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from trait-patterns.toml.
 */
export interface Config {
  /** Model check settings. */
  check: CheckConfig;
  /** Output settings. */
  output: OutputConfig;
  /** Logging settings. */
  logging: LoggingConfig;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  check?: Partial<CheckConfig>;
  output?: Partial<OutputConfig>;
  logging?: Partial<LoggingConfig>;
}
