/**
 * The `mqtt_publish` and `mqtt_subscribe` traits.
 *
 * @packageDocumentation
 */

import { Topic } from '../topic/topic.js';
import type { TopicDirection } from '../topic/types.js';
import { traitPatternFailure, unwrapTrait } from './errors.js';
import { NO_SOURCE_LOCATION, type SourceLocation, type TraitId, type TraitResult } from './types.js';

/**
 * A validated MQTT trait. The direction decides which wildcards the topic
 * may contain.
 */
export class MqttTopicTrait {
  /** `mqtt_publish` or `mqtt_subscribe`. */
  public readonly traitId: TraitId;
  /** Parsed topic. */
  public readonly topic: Topic;
  /** Where the trait was declared. */
  public readonly sourceLocation: SourceLocation;

  private constructor(traitId: TraitId, topic: Topic, sourceLocation: SourceLocation) {
    this.traitId = traitId;
    this.topic = topic;
    this.sourceLocation = sourceLocation;
  }

  /**
   * Creates the trait from its topic text.
   *
   * @param direction - Publish or subscribe.
   * @param value - Topic text.
   * @param sourceLocation - Where the value was found.
   * @returns The trait, or why the topic is invalid.
   */
  static create(
    direction: TopicDirection,
    value: string,
    sourceLocation: SourceLocation = NO_SOURCE_LOCATION
  ): TraitResult<MqttTopicTrait> {
    const traitId: TraitId = direction === 'publish' ? 'mqtt_publish' : 'mqtt_subscribe';
    const topic = Topic.parse(value, direction);
    if (!topic.success) {
      return traitPatternFailure(traitId, sourceLocation, topic.error);
    }
    return { success: true, trait: new MqttTopicTrait(traitId, topic.value, sourceLocation) };
  }

  /**
   * Creates the trait, throwing on failure.
   *
   * @throws {TraitValidationError} When the topic is invalid.
   */
  static createOrThrow(
    direction: TopicDirection,
    value: string,
    sourceLocation?: SourceLocation
  ): MqttTopicTrait {
    return unwrapTrait(MqttTopicTrait.create(direction, value, sourceLocation));
  }

  /** The trait's document value. */
  toNode(): string {
    return this.topic.toString();
  }

  /** Traits are equal when their topics are equal. */
  equals(other: MqttTopicTrait): boolean {
    return this.topic.equals(other.topic);
  }
}

/**
 * Creates an `mqtt_publish` trait.
 */
export function createPublishTrait(
  value: string,
  sourceLocation?: SourceLocation
): TraitResult<MqttTopicTrait> {
  return MqttTopicTrait.create('publish', value, sourceLocation);
}

/**
 * Creates an `mqtt_subscribe` trait.
 */
export function createSubscribeTrait(
  value: string,
  sourceLocation?: SourceLocation
): TraitResult<MqttTopicTrait> {
  return MqttTopicTrait.create('subscribe', value, sourceLocation);
}
