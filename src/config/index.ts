/**
 * Configuration module for trait-patterns.toml parsing.
 *
 * Provides typed configuration parsing with defaults and environment
 * variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export {
  ConfigParseError,
  getDefaultConfig,
  isOutputFormat,
  loadConfig,
  OUTPUT_FORMATS,
  parseConfig,
} from './parser.js';
export type {
  CheckConfig,
  Config,
  LoggingConfig,
  OutputConfig,
  OutputFormat,
  PartialConfig,
} from './types.js';
export { DEFAULT_CHECK, DEFAULT_CONFIG, DEFAULT_LOGGING, DEFAULT_OUTPUT } from './defaults.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvRecord } from './env.js';
