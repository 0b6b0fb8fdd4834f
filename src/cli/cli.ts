#!/usr/bin/env node
/**
 * Command-line interface for checking models and parsing patterns.
 *
 * - check: Load model files and report validation events
 * - parse: Parse a single pattern and print its structure
 * - help, version
 *
 * @packageDocumentation
 */

import {
  applyEnvOverrides,
  getDefaultConfig,
  getEnvVarDocumentation,
  isOutputFormat,
  loadConfig,
  OUTPUT_FORMATS,
  type Config,
  type EnvRecord,
  type OutputFormat,
} from '../config/index.js';
import { parseHostPrefix } from '../host/index.js';
import { VERSION } from '../index.js';
import { loadModel, type LoadedModel, type ValidationEvent } from '../model/index.js';
import type { PatternError, PatternResult } from '../pattern/index.js';
import { Topic } from '../topic/index.js';
import { UriPattern } from '../uri/index.js';
import { Logger } from '../utils/logger.js';
import { safeExists } from '../utils/safe-fs.js';

/**
 * Configuration file looked up in the working directory when `--config`
 * is not given.
 */
export const DEFAULT_CONFIG_PATH = 'trait-patterns.toml';

/**
 * CLI command type.
 */
export type CliCommand = 'check' | 'parse' | 'help' | 'version';

/**
 * Pattern dialects accepted by the parse command.
 */
export type ParseKind = 'uri' | 'host' | 'publish' | 'subscribe';

const PARSE_KINDS: readonly ParseKind[] = ['uri', 'host', 'publish', 'subscribe'];

function isParseKind(value: string): value is ParseKind {
  return PARSE_KINDS.some((kind) => kind === value);
}

/**
 * CLI options parsed from arguments.
 */
export interface CliOptions {
  /** The command to execute. */
  command: CliCommand;
  /** Model files for the check command. */
  files: string[];
  /** Dialect for the parse command. */
  parseKind?: ParseKind | undefined;
  /** Pattern text for the parse command. */
  patternText?: string | undefined;
  /** Explicit configuration file. */
  configPath?: string | undefined;
  /** Output format from `--format`, overriding configuration. */
  format?: OutputFormat | undefined;
  /** Whether `--debug` was given. */
  debug: boolean;
  /** Usage error found while parsing arguments. */
  usageError?: string | undefined;
}

/**
 * Result of CLI command execution.
 */
export interface CliResult {
  /** Whether the command succeeded. */
  success: boolean;
  /** Output message. */
  message: string;
  /** Exit code. */
  exitCode: number;
}

/**
 * Help text for the CLI.
 */
const HELP_TEXT = `
trait-patterns - Check pattern-bearing traits in operation models

Usage:
  trait-patterns <command> [options]

Commands:
  check <model.toml>...           Validate model files
  parse <kind> <pattern>          Parse one pattern (kind: uri, host, publish, subscribe)
  help                            Show this help message
  version                         Show the version

Options:
  --config, -c <path>    Configuration file (default: ./trait-patterns.toml if present)
  --format, -f <format>  Output format: text or json
  --debug                Write debug logs to stderr
  --help, -h             Show this help message

Environment:
${Object.entries(getEnvVarDocumentation())
  .map(([envVar, doc]) => `  ${envVar.padEnd(35)}${doc.description}`)
  .join('\n')}

Examples:
  trait-patterns check weather.toml
  trait-patterns check --format json service.toml
  trait-patterns parse uri "/forecast/{city}?units=metric"
  trait-patterns parse publish "events/{deviceId}/status"
`;

/**
 * Parse CLI arguments into options.
 *
 * @param args - Command line arguments (without node and script).
 * @returns Parsed CLI options; `usageError` is set when they are invalid.
 */
export function parseArgs(args: readonly string[]): CliOptions {
  let command: CliCommand | undefined;
  const positionals: string[] = [];
  let configPath: string | undefined;
  let format: OutputFormat | undefined;
  let debug = false;
  let usageError: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }

    if (arg === '--help' || arg === '-h') {
      command = 'help';
      break;
    }

    if (arg === '--debug') {
      debug = true;
      continue;
    }

    if (arg === '--config' || arg === '-c' || arg === '--format' || arg === '-f') {
      const next = args[i + 1];
      if (next === undefined || next.startsWith('-')) {
        usageError ??= `Option '${arg}' requires a value`;
        continue;
      }
      i++;
      if (arg === '--config' || arg === '-c') {
        configPath = next;
      } else if (isOutputFormat(next)) {
        format = next;
      } else {
        usageError ??= `Unknown format '${next}': expected one of ${OUTPUT_FORMATS.join(', ')}`;
      }
      continue;
    }

    if (arg.startsWith('-') && arg !== '-') {
      usageError ??= `Unknown option '${arg}'`;
      continue;
    }

    if (command === undefined) {
      if (arg === 'check' || arg === 'parse' || arg === 'help' || arg === 'version') {
        command = arg;
      } else {
        usageError ??= `Unknown command '${arg}'`;
        command = 'help';
      }
      continue;
    }

    positionals.push(arg);
  }

  const options: CliOptions = {
    command: command ?? 'help',
    files: [],
    configPath,
    format,
    debug,
  };

  if (options.command === 'check') {
    options.files = positionals;
    if (positionals.length === 0) {
      usageError ??= 'The check command requires at least one model file';
    }
  } else if (options.command === 'parse') {
    const [kind, text, ...rest] = positionals;
    if (kind === undefined || text === undefined) {
      usageError ??= 'The parse command requires a kind and a pattern';
    } else if (!isParseKind(kind)) {
      usageError ??= `Unknown pattern kind '${kind}': expected one of ${PARSE_KINDS.join(', ')}`;
    } else if (rest.length > 0) {
      usageError ??= 'The parse command takes exactly one pattern';
    } else {
      options.parseKind = kind;
      options.patternText = text;
    }
  }

  options.usageError = usageError;
  return options;
}

/**
 * Resolves the effective configuration for a command.
 *
 * Precedence: command-line flags > env > config file > defaults.
 *
 * @param options - CLI options.
 * @param env - Environment to read overrides from.
 * @returns The effective configuration.
 * @throws ConfigParseError or EnvCoercionError when configuration is invalid.
 */
export async function resolveConfig(options: CliOptions, env: EnvRecord): Promise<Config> {
  let config: Config;
  if (options.configPath !== undefined) {
    config = await loadConfig(options.configPath);
  } else if (await safeExists(DEFAULT_CONFIG_PATH)) {
    config = await loadConfig(DEFAULT_CONFIG_PATH);
  } else {
    config = getDefaultConfig();
  }

  config = applyEnvOverrides(config, env);

  return {
    check: config.check,
    output: { format: options.format ?? config.output.format },
    logging: { debug: options.debug || config.logging.debug },
  };
}

/**
 * Formats one validation event as a line of text.
 */
export function formatEvent(event: ValidationEvent): string {
  return `[${event.severity}] ${event.eventId}: ${event.message}`;
}

function countSeverity(model: LoadedModel, severity: ValidationEvent['severity']): number {
  return model.events.filter((event) => event.severity === severity).length;
}

/**
 * Formats a loaded model for text output.
 */
function formatModelText(model: LoadedModel): string {
  const lines = model.events.map(formatEvent);
  const errors = countSeverity(model, 'ERROR');
  const warnings = countSeverity(model, 'WARNING');
  lines.push(
    `${model.filename}: ${String(model.operations.length)} operation(s), ` +
      `${String(errors)} error(s), ${String(warnings)} warning(s): ${model.valid ? 'OK' : 'FAILED'}`
  );
  return lines.join('\n');
}

function modelToJson(model: LoadedModel): Record<string, unknown> {
  return {
    filename: model.filename,
    valid: model.valid,
    operations: model.operations.map((operation) => operation.name),
    events: model.events,
  };
}

/**
 * Execute the check command.
 *
 * @param options - CLI options.
 * @param env - Environment to read overrides from.
 * @returns CLI result; exit code 1 when any model is invalid or unreadable.
 */
export async function executeCheck(options: CliOptions, env: EnvRecord): Promise<CliResult> {
  let config: Config;
  try {
    config = await resolveConfig(options, env);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    return { success: false, message: `Error reading configuration: ${errorMessage}`, exitCode: 1 };
  }

  const logger = new Logger({ component: 'cli', debugMode: config.logging.debug });
  logger.debug('check_started', { files: options.files, config });

  const models: LoadedModel[] = [];
  const failures: string[] = [];
  for (const file of options.files) {
    try {
      models.push(
        await loadModel(file, {
          detectConflicts: config.check.detect_conflicts,
          warningsAsErrors: config.check.warnings_as_errors,
          logger,
        })
      );
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.error('model_unreadable', { file, error: errorMessage });
      failures.push(errorMessage);
    }
  }

  const success = failures.length === 0 && models.every((model) => model.valid);

  let message: string;
  if (config.output.format === 'json') {
    message = JSON.stringify({ success, models: models.map(modelToJson), failures }, null, 2);
  } else {
    message = [...models.map(formatModelText), ...failures.map((f) => `Error: ${f}`)].join('\n');
  }

  return { success, message, exitCode: success ? 0 : 1 };
}

interface ParsedPatternView {
  readonly rendered: string;
  readonly parts: ReadonlyArray<{ readonly kind: string; readonly content: string }>;
  readonly query?: Record<string, string>;
}

function parsePattern(kind: ParseKind, text: string): PatternResult<ParsedPatternView> {
  const view = <T>(
    result: PatternResult<T>,
    toView: (value: T) => ParsedPatternView
  ): PatternResult<ParsedPatternView> =>
    result.success ? { success: true, value: toView(result.value) } : result;

  switch (kind) {
    case 'uri':
      return view(UriPattern.parse(text), (uri) => ({
        rendered: uri.render(),
        parts: uri.segments(),
        query: Object.fromEntries(uri.queryLiterals()),
      }));
    case 'host':
      return view(parseHostPrefix(text), (pattern) => ({
        rendered: pattern.render(),
        parts: pattern.segments(),
      }));
    case 'publish':
    case 'subscribe':
      return view(Topic.parse(text, kind), (topic) => ({
        rendered: topic.render(),
        parts: topic.levels(),
      }));
  }
}

function formatPatternError(error: PatternError): string {
  return `Invalid pattern (${error.kind}): ${error.message}`;
}

/**
 * Execute the parse command.
 *
 * @param options - CLI options with `parseKind` and `patternText` set.
 * @param env - Environment to read overrides from.
 * @returns CLI result; exit code 1 when the pattern is invalid.
 */
export async function executeParse(options: CliOptions, env: EnvRecord): Promise<CliResult> {
  const { parseKind, patternText } = options;
  if (parseKind === undefined || patternText === undefined) {
    return { success: false, message: 'The parse command requires a kind and a pattern', exitCode: 2 };
  }

  let format: OutputFormat;
  try {
    format = (await resolveConfig(options, env)).output.format;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    return { success: false, message: `Error reading configuration: ${errorMessage}`, exitCode: 1 };
  }

  const result = parsePattern(parseKind, patternText);

  if (format === 'json') {
    const body = result.success
      ? {
          success: true,
          kind: parseKind,
          rendered: result.value.rendered,
          parts: result.value.parts.map(({ kind, content }) => ({ kind, content })),
          ...(result.value.query === undefined ? {} : { query: result.value.query }),
        }
      : {
          success: false,
          kind: parseKind,
          error: { kind: result.error.kind, message: result.error.message },
        };
    return { success: result.success, message: JSON.stringify(body, null, 2), exitCode: result.success ? 0 : 1 };
  }

  if (!result.success) {
    return { success: false, message: formatPatternError(result.error), exitCode: 1 };
  }

  const lines = [`${parseKind} ${result.value.rendered}`];
  for (const part of result.value.parts) {
    lines.push(`  ${part.kind} ${part.content}`);
  }
  for (const [key, value] of Object.entries(result.value.query ?? {})) {
    lines.push(`  query ${value === '' ? key : `${key}=${value}`}`);
  }
  return { success: true, message: lines.join('\n'), exitCode: 0 };
}

/**
 * Execute the help command.
 *
 * @returns CLI result.
 */
export function executeHelp(): CliResult {
  return {
    success: true,
    message: HELP_TEXT.trim(),
    exitCode: 0,
  };
}

/**
 * Execute a CLI command.
 *
 * @param options - CLI options.
 * @param env - Environment to read overrides from (defaults to process.env).
 * @returns CLI result.
 */
export async function executeCommand(
  options: CliOptions,
  env: EnvRecord = process.env
): Promise<CliResult> {
  if (options.usageError !== undefined) {
    return {
      success: false,
      message: `Error: ${options.usageError}\nRun 'trait-patterns help' for usage.`,
      exitCode: 2,
    };
  }

  switch (options.command) {
    case 'check':
      return executeCheck(options, env);
    case 'parse':
      return executeParse(options, env);
    case 'help':
      return executeHelp();
    case 'version':
      return { success: true, message: VERSION, exitCode: 0 };
  }
}

/**
 * Main CLI entry point.
 *
 * @param args - Command line arguments.
 * @returns Exit code.
 */
export async function main(args: readonly string[]): Promise<number> {
  const options = parseArgs(args);
  const result = await executeCommand(options);

  // Output result
  process.stdout.write(result.message + '\n');

  return result.exitCode;
}

// Run if executed directly
if (typeof process !== 'undefined' && process.argv[1] !== undefined) {
  const isDirectExecution =
    process.argv[1].endsWith('cli.ts') ||
    process.argv[1].endsWith('cli.js') ||
    process.argv[1].endsWith('trait-patterns');

  if (isDirectExecution) {
    main(process.argv.slice(2))
      .then((exitCode) => {
        process.exit(exitCode);
      })
      .catch((error: unknown) => {
        const errorMessage = error instanceof Error ? error.message : String(error);
        process.stderr.write(`Fatal error: ${errorMessage}\n`);
        process.exit(1);
      });
  }
}
