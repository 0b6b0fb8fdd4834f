/**
 * Loads model documents and builds their pattern-bearing traits.
 *
 * A model is TOML. Its shape is checked against the model schema, then
 * each trait value is parsed; invalid values become `ERROR` events carrying
 * the value's location in the file. Finally operations are checked against
 * each other for routing conflicts.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { EndpointTrait } from '../traits/endpoint-trait.js';
import { HttpTrait, type HttpTraitNode } from '../traits/http-trait.js';
import { MqttTopicTrait } from '../traits/mqtt-traits.js';
import type { TraitError, TraitResult } from '../traits/types.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { safeReadTextFile } from '../utils/safe-fs.js';
import { findHttpConflicts, findTopicConflicts } from './conflicts.js';
import { locateOperationKey } from './locate.js';
import { validateModelDocument } from './schema.js';
import type {
  LoadModelOptions,
  LoadedModel,
  OperationShape,
  ValidationEvent,
} from './types.js';

/**
 * Error class for models that cannot be read at all.
 */
export class ModelLoadError extends Error {
  /** The file that could not be read. */
  public readonly filename: string;
  /** The original error that caused the failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ModelLoadError.
   *
   * @param message - Descriptive error message.
   * @param filename - The file that could not be read.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, filename: string, cause?: Error) {
    super(message);
    this.name = 'ModelLoadError';
    this.filename = filename;
    this.cause = cause;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads the line and column a TOML syntax error reports, if any.
 */
function syntaxErrorPosition(err: unknown): { line: number; column: number } {
  if (isRecord(err) && typeof err.line === 'number' && typeof err.col === 'number') {
    return { line: err.line + 1, column: err.col + 1 };
  }
  return { line: 0, column: 0 };
}

function traitErrorEvent(operation: string, error: TraitError): ValidationEvent {
  return {
    severity: 'ERROR',
    eventId: 'TraitValue',
    message: error.message,
    operation,
    sourceLocation: error.sourceLocation,
  };
}

/**
 * Builds one operation, collecting failures for invalid trait values.
 */
function buildOperation(
  name: string,
  raw: Record<string, unknown>,
  source: string,
  filename: string,
  events: ValidationEvent[]
): OperationShape {
  const locate = (key: string) => locateOperationKey(source, filename, name, key);
  const accept = <T>(result: TraitResult<T>): T | undefined => {
    if (result.success) {
      return result.trait;
    }
    events.push(traitErrorEvent(name, result.error));
    return undefined;
  };

  let operation: OperationShape = { name };
  if (typeof raw.documentation === 'string') {
    operation = { ...operation, documentation: raw.documentation };
  }

  const http = raw.http;
  if (isRecord(http) && typeof http.method === 'string' && typeof http.uri === 'string') {
    const node: HttpTraitNode =
      typeof http.code === 'number'
        ? { method: http.method, uri: http.uri, code: http.code }
        : { method: http.method, uri: http.uri };
    const trait = accept(HttpTrait.create(node, locate('http')));
    if (trait !== undefined) {
      operation = { ...operation, http: trait };
    }
  }

  const endpoint = raw.endpoint;
  if (isRecord(endpoint) && typeof endpoint.host_prefix === 'string') {
    const trait = accept(
      EndpointTrait.create({ host_prefix: endpoint.host_prefix }, locate('endpoint'))
    );
    if (trait !== undefined) {
      operation = { ...operation, endpoint: trait };
    }
  }

  if (typeof raw.mqtt_publish === 'string') {
    const trait = accept(MqttTopicTrait.create('publish', raw.mqtt_publish, locate('mqtt_publish')));
    if (trait !== undefined) {
      operation = { ...operation, mqttPublish: trait };
    }
  }

  if (typeof raw.mqtt_subscribe === 'string') {
    const trait = accept(
      MqttTopicTrait.create('subscribe', raw.mqtt_subscribe, locate('mqtt_subscribe'))
    );
    if (trait !== undefined) {
      operation = { ...operation, mqttSubscribe: trait };
    }
  }

  return operation;
}

function finish(
  filename: string,
  operations: readonly OperationShape[],
  events: readonly ValidationEvent[],
  options: LoadModelOptions
): LoadedModel {
  const warningsAsErrors = options.warningsAsErrors ?? false;
  const valid = !events.some(
    (event) => event.severity === 'ERROR' || (warningsAsErrors && event.severity === 'WARNING')
  );
  const log = (options.logger ?? defaultLogger).child('model-loader');
  log.debug('model_loaded', {
    filename,
    operations: operations.length,
    events: events.length,
    valid,
  });
  return { filename, operations, events, valid };
}

/**
 * Parses and validates a model document.
 *
 * @param source - TOML text of the model.
 * @param filename - File name used in source locations.
 * @param options - Loading options.
 * @returns The loaded model; check `valid` and `events`.
 *
 * @example
 * ```typescript
 * const model = parseModel(text, 'weather.toml');
 * for (const event of model.events) {
 *   console.error(`${event.severity} ${event.eventId}: ${event.message}`);
 * }
 * ```
 */
export function parseModel(
  source: string,
  filename: string,
  options: LoadModelOptions = {}
): LoadedModel {
  const events: ValidationEvent[] = [];

  let document: unknown;
  try {
    document = TOML.parse(source);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    events.push({
      severity: 'ERROR',
      eventId: 'Model',
      message: `Failed to parse TOML: ${message}`,
      sourceLocation: { filename, ...syntaxErrorPosition(err) },
    });
    return finish(filename, [], events, options);
  }

  const schemaErrors = validateModelDocument(document);
  if (schemaErrors.length > 0 || !isRecord(document) || !isRecord(document.operations)) {
    for (const problem of schemaErrors) {
      events.push({
        severity: 'ERROR',
        eventId: 'Model',
        message: `Invalid model document: ${problem}`,
        sourceLocation: { filename, line: 0, column: 0 },
      });
    }
    return finish(filename, [], events, options);
  }

  const operations: OperationShape[] = [];
  for (const [name, raw] of Object.entries(document.operations)) {
    if (isRecord(raw)) {
      operations.push(buildOperation(name, raw, source, filename, events));
    }
  }

  if (options.detectConflicts ?? true) {
    events.push(...findHttpConflicts(operations), ...findTopicConflicts(operations));
  }

  return finish(filename, operations, events, options);
}

/**
 * Reads and validates a model file.
 *
 * @param filePath - Path to the model file.
 * @param options - Loading options.
 * @returns The loaded model.
 * @throws {ModelLoadError} If the file cannot be read.
 */
export async function loadModel(
  filePath: string,
  options: LoadModelOptions = {}
): Promise<LoadedModel> {
  let source: string;
  try {
    source = await safeReadTextFile(filePath);
  } catch (err) {
    const cause = err instanceof Error ? err : undefined;
    throw new ModelLoadError(
      `Failed to read model file '${filePath}': ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      cause
    );
  }
  return parseModel(source, filePath, options);
}
