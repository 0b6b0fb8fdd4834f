/**
 * Structured logging utility.
 *
 * Writes one JSON object per line to stderr so that stdout stays reserved
 * for command output.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information, emitted only in debug mode
 * - `info`: General informational messages about normal operation
 * - `warn`: Conditions that don't prevent operation but may need attention
 * - `error`: Failures
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Represents a structured log entry with timestamp and metadata.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  /** Severity level of the log entry. */
  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "model-loader"
   */
  readonly component: string;

  /**
   * Brief snake_case description of the logged event.
   * @example "model_loaded"
   */
  readonly event: string;

  /** Additional structured data associated with the log entry. */
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;

  /** Function to get current timestamp (injectable for testing). */
  readonly now?: () => Date;
}

/**
 * Serializes an entry, falling back to a marker when `data` cannot be
 * turned into JSON (circular references, BigInt values).
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (err) {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: err instanceof Error ? err.message : String(err),
      originalData: '[unserializable]',
    });
  }
}

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'model-loader', debugMode: true });
 * logger.debug('model_parsed', { operations: 3 });
 * logger.error('model_unreadable', { filename: 'model.toml' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly now: () => Date;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Creates a logger for a sub-component with the same settings.
   *
   * @param component - Name of the sub-component.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, now: this.now });
  }

  /**
   * Logs a debug-level message. Only output when debugMode is enabled.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry =
      data === undefined
        ? { timestamp: this.now().toISOString(), level, component: this.component, event }
        : { timestamp: this.now().toISOString(), level, component: this.component, event, data };

    process.stderr.write(serializeEntry(entry) + '\n');
  }
}

/**
 * Default logger instance, debug disabled.
 */
export const logger = new Logger({ component: 'trait-patterns', debugMode: false });
