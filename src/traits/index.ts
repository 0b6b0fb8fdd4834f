/**
 * Traits that carry pattern templates.
 *
 * @packageDocumentation
 */

export type { SourceLocation, TraitError, TraitId, TraitResult } from './types.js';
export { NO_SOURCE_LOCATION } from './types.js';
export {
  TraitValidationError,
  createTraitError,
  formatSourceLocation,
  unwrapTrait,
} from './errors.js';
export { DEFAULT_HTTP_CODE, HttpTrait } from './http-trait.js';
export type { HttpTraitNode } from './http-trait.js';
export { EndpointTrait } from './endpoint-trait.js';
export type { EndpointTraitNode } from './endpoint-trait.js';
export { MqttTopicTrait, createPublishTrait, createSubscribeTrait } from './mqtt-traits.js';
