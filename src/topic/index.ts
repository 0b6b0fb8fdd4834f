/**
 * MQTT topic dialect.
 *
 * @packageDocumentation
 */

export type { TopicDirection, TopicLevel, TopicLevelKind } from './types.js';
export { TOPIC_LEVEL_SEPARATOR, Topic, parseTopic, parseTopicOrThrow } from './topic.js';
