/**
 * MQTT topic templates, e.g. `things/{thingId}/shadow` or `things/+/events/#`.
 *
 * Levels are separated by `/`. A level is a literal, a `{label}` spanning
 * the entire level, `+` or `#`. Publish topics must not contain wildcards;
 * subscribe topics may, with `#` only as the final level.
 *
 * @packageDocumentation
 */

import { asciiLowerCase } from '../pattern/chars.js';
import { createPatternError, failure, success, unwrapPattern } from '../pattern/errors.js';
import { findDuplicateLabel } from '../pattern/pattern.js';
import { parseSegment } from '../pattern/segment.js';
import type { PatternError, PatternResult } from '../pattern/types.js';
import type { TopicDirection, TopicLevel } from './types.js';

/** Separator between topic levels. */
export const TOPIC_LEVEL_SEPARATOR = '/';

const SINGLE_LEVEL_WILDCARD = '+';
const MULTI_LEVEL_WILDCARD = '#';

function wildcardError(message: string, level: string, text: string): PatternError {
  return createPatternError('illegal_wildcard', message, level, text);
}

/**
 * Classifies one level of a topic.
 */
function parseLevel(
  level: string,
  index: number,
  levelCount: number,
  text: string,
  direction: TopicDirection
): PatternResult<TopicLevel> {
  if (level === SINGLE_LEVEL_WILDCARD || level === MULTI_LEVEL_WILDCARD) {
    if (direction === 'publish') {
      return failure(
        wildcardError(
          `Wildcard levels are not allowed in publish topics. Found \`${level}\` in \`${text}\``,
          level,
          text
        )
      );
    }
    if (level === MULTI_LEVEL_WILDCARD) {
      if (index !== levelCount - 1) {
        return failure(
          wildcardError(
            `A multi-level wildcard must be the last level of a topic. Found \`${text}\``,
            level,
            text
          )
        );
      }
      return success({ kind: 'multi_level_wildcard', content: level, text: level });
    }
    return success({ kind: 'single_level_wildcard', content: level, text: level });
  }

  const parsed = parseSegment(level, text);
  if (!parsed.success) {
    if (parsed.error.kind === 'illegal_literal_character') {
      return failure(
        createPatternError(
          'illegal_literal_character',
          `Topic labels must span an entire level. Found \`${level}\` in \`${text}\``,
          level,
          text,
          parsed.error.character
        )
      );
    }
    return parsed;
  }

  const segment = parsed.value;
  switch (segment.kind) {
    case 'greedy_label':
      return failure(
        createPatternError(
          'greedy_label_not_allowed',
          `Topic labels must not be greedy. Found \`${level}\` in \`${text}\``,
          segment.content,
          text
        )
      );
    case 'label':
      return success({ kind: 'label', content: segment.content, text: level });
    case 'literal':
      if (level.includes(SINGLE_LEVEL_WILDCARD) || level.includes(MULTI_LEVEL_WILDCARD)) {
        return failure(
          wildcardError(
            `Wildcards must occupy an entire topic level. Found \`${level}\` in \`${text}\``,
            level,
            text
          )
        );
      }
      return success({ kind: 'literal', content: level, text: level });
  }
}

/**
 * A parsed MQTT topic template.
 */
export class Topic {
  /** Whether the topic is published to or subscribed from. */
  public readonly direction: TopicDirection;
  private readonly source: string;
  private readonly levelList: readonly TopicLevel[];

  private constructor(source: string, levels: readonly TopicLevel[], direction: TopicDirection) {
    this.source = source;
    this.levelList = Object.freeze(levels.map((level) => Object.freeze(level)));
    this.direction = direction;
  }

  /**
   * Parses a topic template.
   *
   * @param text - Topic text.
   * @param direction - Publish or subscribe.
   * @returns The parsed topic, or the first failure.
   */
  static parse(text: string, direction: TopicDirection): PatternResult<Topic> {
    const rawLevels = text.split(TOPIC_LEVEL_SEPARATOR);
    const levels: TopicLevel[] = [];

    for (const [index, raw] of rawLevels.entries()) {
      const level = parseLevel(raw, index, rawLevels.length, text, direction);
      if (!level.success) {
        return level;
      }
      levels.push(level.value);
    }

    const duplicate = findDuplicateLabel(
      levels.filter((level) => level.kind === 'label'),
      text
    );
    if (duplicate !== undefined) {
      return failure(duplicate);
    }

    return success(new Topic(text, levels, direction));
  }

  /** All levels, in order. */
  levels(): readonly TopicLevel[] {
    return this.levelList;
  }

  /** Label levels, in order. */
  labels(): readonly TopicLevel[] {
    return this.levelList.filter((level) => level.kind === 'label');
  }

  /** Gets a label level by case-insensitive name. */
  label(name: string): TopicLevel | undefined {
    const key = asciiLowerCase(name);
    return this.levelList.find(
      (level) => level.kind === 'label' && asciiLowerCase(level.content) === key
    );
  }

  /** Whether any level is `+` or `#`. */
  hasWildcards(): boolean {
    return this.levelList.some(
      (level) => level.kind === 'single_level_wildcard' || level.kind === 'multi_level_wildcard'
    );
  }

  /**
   * Checks whether a concrete topic name is matched by this template.
   *
   * Labels and `+` match exactly one level, `#` matches all remaining
   * levels (including none), literals match themselves.
   *
   * @param topicName - A concrete topic name, e.g. `things/abc/events`.
   * @returns True on match.
   */
  matches(topicName: string): boolean {
    const names = topicName.split(TOPIC_LEVEL_SEPARATOR);

    for (const [i, level] of this.levelList.entries()) {
      if (level.kind === 'multi_level_wildcard') {
        return true;
      }
      const name = names[i];
      if (name === undefined) {
        return false;
      }
      if (level.kind === 'literal' && level.content !== name) {
        return false;
      }
    }

    return names.length === this.levelList.length;
  }

  /**
   * Checks whether two templates overlap.
   *
   * A `#` in either template at a shared position is a conflict. Two
   * different literals, or a literal against a label or `+`, are not.
   * Without a decision, templates of equal length conflict.
   *
   * @param other - Topic to compare with.
   * @returns True if the topics conflict.
   */
  conflictsWith(other: Topic): boolean {
    const shared = Math.min(this.levelList.length, other.levelList.length);

    for (let i = 0; i < shared; i++) {
      const a = this.levelList[i];
      const b = other.levelList[i];
      if (a === undefined || b === undefined) {
        break;
      }
      if (a.kind === 'multi_level_wildcard' || b.kind === 'multi_level_wildcard') {
        return true;
      }
      const aLiteral = a.kind === 'literal';
      const bLiteral = b.kind === 'literal';
      if (aLiteral !== bLiteral) {
        return false;
      }
      if (aLiteral && a.content !== b.content) {
        return false;
      }
    }

    return this.levelList.length === other.levelList.length;
  }

  /**
   * Rebuilds the topic from its levels.
   */
  render(): string {
    return this.levelList.map((level) => level.text).join(TOPIC_LEVEL_SEPARATOR);
  }

  /** Topics are equal when parsed from the same text in the same direction. */
  equals(other: Topic): boolean {
    return this.source === other.source && this.direction === other.direction;
  }

  /** The original topic text. */
  toString(): string {
    return this.source;
  }
}

/**
 * Parses a topic template.
 */
export function parseTopic(text: string, direction: TopicDirection): PatternResult<Topic> {
  return Topic.parse(text, direction);
}

/**
 * Parses a topic template, throwing on failure.
 *
 * @throws {InvalidPatternError} When the topic is invalid.
 */
export function parseTopicOrThrow(text: string, direction: TopicDirection): Topic {
  return unwrapPattern(Topic.parse(text, direction));
}
