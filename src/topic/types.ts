/**
 * Types for MQTT topic templates.
 *
 * @packageDocumentation
 */

/**
 * Kind of a topic level.
 */
export type TopicLevelKind =
  | 'literal' // Fixed text, e.g. `things`
  | 'label' // `{name}`, bound to exactly one level
  | 'single_level_wildcard' // `+`
  | 'multi_level_wildcard'; // `#`, final level only

/**
 * Whether a topic is published to or subscribed from.
 *
 * Publish topics name one concrete topic and must not contain wildcards.
 * Subscribe topics are filters and may contain them.
 */
export type TopicDirection = 'publish' | 'subscribe';

/**
 * One `/`-delimited level of a topic.
 */
export interface TopicLevel {
  /** Kind of the level. */
  readonly kind: TopicLevelKind;
  /** Label name for labels; the level text otherwise. */
  readonly content: string;
  /** The level as written in the topic. */
  readonly text: string;
}
