/**
 * Cross-operation conflict checks.
 *
 * @packageDocumentation
 */

import type { OperationShape, ValidationEvent } from './types.js';

/**
 * Reports operations whose HTTP bindings can match the same request.
 *
 * Each conflicting pair is reported once, on the later operation.
 *
 * @param operations - Operations in document order.
 * @returns `HttpUriConflict` errors.
 */
export function findHttpConflicts(operations: readonly OperationShape[]): ValidationEvent[] {
  const events: ValidationEvent[] = [];

  for (let j = 1; j < operations.length; j++) {
    const later = operations[j];
    const laterHttp = later?.http;
    if (later === undefined || laterHttp === undefined) {
      continue;
    }
    for (const earlier of operations.slice(0, j)) {
      const earlierHttp = earlier.http;
      if (earlierHttp === undefined || earlierHttp.method !== laterHttp.method) {
        continue;
      }
      if (laterHttp.uri.conflictsWith(earlierHttp.uri)) {
        events.push({
          severity: 'ERROR',
          eventId: 'HttpUriConflict',
          message:
            `Operation \`${later.name}\` (${laterHttp.method} ${laterHttp.uri.toString()}) conflicts with ` +
            `operation \`${earlier.name}\` (${earlierHttp.method} ${earlierHttp.uri.toString()})`,
          operation: later.name,
          sourceLocation: laterHttp.sourceLocation,
        });
      }
    }
  }

  return events;
}

/**
 * Reports operations that publish to overlapping topics.
 *
 * @param operations - Operations in document order.
 * @returns `MqttTopicConflict` warnings.
 */
export function findTopicConflicts(operations: readonly OperationShape[]): ValidationEvent[] {
  const events: ValidationEvent[] = [];

  for (let j = 1; j < operations.length; j++) {
    const later = operations[j];
    const laterPublish = later?.mqttPublish;
    if (later === undefined || laterPublish === undefined) {
      continue;
    }
    for (const earlier of operations.slice(0, j)) {
      const earlierPublish = earlier.mqttPublish;
      if (earlierPublish === undefined) {
        continue;
      }
      if (laterPublish.topic.conflictsWith(earlierPublish.topic)) {
        events.push({
          severity: 'WARNING',
          eventId: 'MqttTopicConflict',
          message:
            `Operation \`${later.name}\` publishes to \`${laterPublish.topic.toString()}\`, which conflicts with ` +
            `\`${earlierPublish.topic.toString()}\` of operation \`${earlier.name}\``,
          operation: later.name,
          sourceLocation: laterPublish.sourceLocation,
        });
      }
    }
  }

  return events;
}
