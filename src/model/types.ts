/**
 * Types for model documents and their validation events.
 *
 * @packageDocumentation
 */

import type { EndpointTrait } from '../traits/endpoint-trait.js';
import type { HttpTrait } from '../traits/http-trait.js';
import type { MqttTopicTrait } from '../traits/mqtt-traits.js';
import type { SourceLocation } from '../traits/types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Severity of a validation event.
 */
export type Severity = 'ERROR' | 'WARNING';

/**
 * Identifiers of the checks that produce validation events.
 */
export type ValidationEventId =
  | 'Model' // Document syntax or shape
  | 'TraitValue' // A trait value failed to parse
  | 'HttpUriConflict' // Two operations route to the same method and URI
  | 'MqttTopicConflict'; // Two operations publish to overlapping topics

/**
 * A finding reported while loading a model.
 */
export interface ValidationEvent {
  /** Severity of the finding. */
  readonly severity: Severity;
  /** Check that produced the finding. */
  readonly eventId: ValidationEventId;
  /** Human-readable message. */
  readonly message: string;
  /** Operation the finding is about, if any. */
  readonly operation?: string;
  /** Where the finding applies. */
  readonly sourceLocation: SourceLocation;
}

/**
 * An operation with the pattern-bearing traits applied to it.
 */
export interface OperationShape {
  /** Operation name. */
  readonly name: string;
  /** Free-form documentation. */
  readonly documentation?: string;
  /** `http` trait, when present and valid. */
  readonly http?: HttpTrait;
  /** `endpoint` trait, when present and valid. */
  readonly endpoint?: EndpointTrait;
  /** `mqtt_publish` trait, when present and valid. */
  readonly mqttPublish?: MqttTopicTrait;
  /** `mqtt_subscribe` trait, when present and valid. */
  readonly mqttSubscribe?: MqttTopicTrait;
}

/**
 * Options for loading a model.
 */
export interface LoadModelOptions {
  /**
   * Whether to check operations against each other for conflicts.
   * @defaultValue true
   */
  readonly detectConflicts?: boolean;
  /**
   * Whether warnings make the model invalid.
   * @defaultValue false
   */
  readonly warningsAsErrors?: boolean;
  /** Logger for diagnostics. */
  readonly logger?: Logger;
}

/**
 * Result of loading a model.
 */
export interface LoadedModel {
  /** File the model came from. */
  readonly filename: string;
  /** Operations in document order. Invalid traits are left out. */
  readonly operations: readonly OperationShape[];
  /** Findings in the order they were produced. */
  readonly events: readonly ValidationEvent[];
  /** False when any ERROR (or, with warningsAsErrors, any WARNING) was found. */
  readonly valid: boolean;
}
