/**
 * Types for the segmented pattern language shared by URI, host-prefix and
 * MQTT topic templates.
 *
 * @packageDocumentation
 */

/**
 * Kind of a pattern segment.
 *
 * - `literal`: text copied verbatim (e.g. `things`)
 * - `label`: a named placeholder (e.g. `{thingId}`)
 * - `greedy_label`: a placeholder that may span several segments (e.g. `{key+}`)
 */
export type SegmentKind = 'literal' | 'label' | 'greedy_label';

/**
 * One token of a pattern.
 *
 * Segments are frozen value objects. Two segments are equal when their
 * rendered `text` is equal.
 */
export interface Segment {
  /** Kind of the segment. */
  readonly kind: SegmentKind;
  /** Label name for labels, literal text for literals. Never empty. */
  readonly content: string;
  /** Rendered form: literal verbatim, `{name}` or `{name+}`. */
  readonly text: string;
}

/**
 * Categories of pattern failures.
 */
export type PatternErrorKind =
  | 'empty_segment' // A literal or label token was empty
  | 'invalid_label_name' // Label name is not [A-Za-z0-9_]+
  | 'illegal_literal_character' // Literal contains `{` or `}`
  | 'duplicate_label' // Two labels share a case-insensitive name
  | 'greedy_label_not_last' // A greedy label is followed by another label
  | 'multiple_greedy_labels' // More than one greedy label
  | 'greedy_label_not_allowed' // Greedy label in a dialect that forbids it
  | 'adjacent_labels' // Host prefix: labels with no literal between them
  | 'illegal_wildcard' // Topic: wildcard where the direction forbids it
  | 'invalid_uri' // URI: missing leading `/`, trailing `?` or a fragment
  | 'label_in_query_string' // URI: braces in the query string
  | 'duplicate_query_literal'; // URI: repeated query key

/**
 * Structured failure produced while parsing or validating a pattern.
 */
export interface PatternError {
  /** Failure category for programmatic handling. */
  readonly kind: PatternErrorKind;
  /** Human-readable message, including the pattern text. */
  readonly message: string;
  /** The offending segment, level or label content. */
  readonly content: string;
  /** The complete pattern text being parsed. */
  readonly source: string;
  /** For `illegal_literal_character`: the first brace found in the literal. */
  readonly character?: '{' | '}';
}

/**
 * Outcome of parsing a pattern. No partially built value is ever returned.
 */
export type PatternResult<T> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: PatternError };
