/**
 * Segment construction and parsing.
 *
 * A token is a label when it is at least two characters long, starts with
 * `{` and ends with `}`. Everything else is a literal. Content rules are
 * re-checked on construction, so `{foo` fails as a literal containing `{`.
 *
 * @packageDocumentation
 */

import { findBrace, isValidLabelName } from './chars.js';
import { createPatternError, failure, success } from './errors.js';
import type { PatternResult, Segment, SegmentKind } from './types.js';

/** Label name grammar, quoted in error messages. */
export const LABEL_NAME_GRAMMAR = '^[a-zA-Z0-9_]+$';

/**
 * Renders a segment's textual form from its kind and content.
 */
function renderText(kind: SegmentKind, content: string): string {
  switch (kind) {
    case 'greedy_label':
      return `{${content}+}`;
    case 'label':
      return `{${content}}`;
    case 'literal':
      return content;
  }
}

/**
 * Creates a segment after validating its content.
 *
 * @param kind - Segment kind.
 * @param content - Label name or literal text.
 * @param source - Complete pattern text, carried in failures.
 * @returns The frozen segment, or the content failure.
 */
export function createSegment(
  kind: SegmentKind,
  content: string,
  source: string = content
): PatternResult<Segment> {
  if (kind === 'literal') {
    if (content.length === 0) {
      return failure(
        createPatternError('empty_segment', `Segments must not be empty. Found in pattern \`${source}\``, content, source)
      );
    }
    const brace = findBrace(content);
    if (brace !== undefined) {
      return failure(
        createPatternError(
          'illegal_literal_character',
          `Literal segments must not contain \`{\` or \`}\` characters. Found segment \`${content}\``,
          content,
          source,
          brace
        )
      );
    }
  } else if (content.length === 0) {
    return failure(
      createPatternError('empty_segment', `Empty label declaration in pattern \`${source}\``, content, source)
    );
  } else if (!isValidLabelName(content)) {
    return failure(
      createPatternError(
        'invalid_label_name',
        `Invalid label name in pattern: '${content}'. Labels must satisfy the following regular expression: ${LABEL_NAME_GRAMMAR}`,
        content,
        source
      )
    );
  }

  return success(Object.freeze({ kind, content, text: renderText(kind, content) }));
}

/**
 * Parses one token into a segment.
 *
 * @param token - The token text, already split off by the dialect.
 * @param source - Complete pattern text, carried in failures.
 * @returns The parsed segment, or why the token is invalid.
 *
 * @example
 * ```typescript
 * parseSegment('{key+}');
 * // { success: true, value: { kind: 'greedy_label', content: 'key', text: '{key+}' } }
 * ```
 */
export function parseSegment(token: string, source: string = token): PatternResult<Segment> {
  if (token.length >= 2 && token.startsWith('{') && token.endsWith('}')) {
    if (token.charAt(token.length - 2) === '+') {
      return createSegment('greedy_label', token.slice(1, -2), source);
    }
    return createSegment('label', token.slice(1, -1), source);
  }
  return createSegment('literal', token, source);
}

/**
 * Checks whether a segment is a label (greedy or not).
 */
export function isLabel(segment: Segment): boolean {
  return segment.kind !== 'literal';
}

/**
 * Checks whether a segment is a greedy label.
 */
export function isGreedyLabel(segment: Segment): boolean {
  return segment.kind === 'greedy_label';
}

/**
 * Segments are equal when their rendered forms are equal.
 */
export function segmentEquals(a: Segment, b: Segment): boolean {
  return a.text === b.text;
}

/**
 * Orders segments by their rendered form.
 *
 * @returns Negative, zero or positive, suitable for `Array.prototype.sort`.
 */
export function compareSegments(a: Segment, b: Segment): number {
  if (a.text === b.text) {
    return 0;
  }
  return a.text < b.text ? -1 : 1;
}
