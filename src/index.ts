/**
 * trait-patterns
 *
 * Label templates for operation traits: HTTP URIs, endpoint host prefixes
 * and MQTT topics, with a model checker that validates them in bulk.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export * from './pattern/index.js';
export * from './host/index.js';
export * from './uri/index.js';
export * from './topic/index.js';
export * from './traits/index.js';
export * from './model/index.js';
