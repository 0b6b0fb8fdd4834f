/**
 * Host-prefix templates, e.g. `{accountId}.data-`.
 *
 * Host prefixes have no separator: the text is a run of literals and
 * `{label}` tokens. Greedy labels are forbidden and two labels must be
 * separated by at least one literal character.
 *
 * @packageDocumentation
 */

import { createPatternError, failure, success, unwrapPattern } from '../pattern/errors.js';
import { Pattern } from '../pattern/pattern.js';
import { parseSegment } from '../pattern/segment.js';
import type { PatternError, PatternResult, Segment } from '../pattern/types.js';

/**
 * A raw token of a host prefix, before segment parsing.
 */
export interface HostToken {
  /** Token text as it appears in the source. */
  readonly text: string;
  /** Offset of the token in the source. */
  readonly offset: number;
  /** Whether the tokenizer saw this token as a `{...}` label. */
  readonly isLabel: boolean;
}

/**
 * Splits a host prefix into literal runs and label tokens.
 *
 * A `{` opens a label token that ends at the next `}`. A `{` followed by
 * another `{` before any `}` becomes a literal token ending at the second
 * `{`, and a `{` without a later `}` turns the rest of the text into one
 * literal token. A `}` seen outside a label stays inside the literal run.
 *
 * @param text - Host prefix text.
 * @returns Tokens in source order.
 */
export function tokenizeHostPrefix(text: string): HostToken[] {
  const tokens: HostToken[] = [];
  let i = 0;

  while (i < text.length) {
    if (text.charAt(i) === '{') {
      const close = text.indexOf('}', i + 1);
      const reopen = text.indexOf('{', i + 1);
      if (reopen !== -1 && (close === -1 || reopen < close)) {
        tokens.push({ text: text.slice(i, reopen), offset: i, isLabel: false });
        i = reopen;
        continue;
      }
      if (close === -1) {
        tokens.push({ text: text.slice(i), offset: i, isLabel: false });
        break;
      }
      tokens.push({ text: text.slice(i, close + 1), offset: i, isLabel: true });
      i = close + 1;
      continue;
    }

    const start = i;
    while (i < text.length && text.charAt(i) !== '{') {
      i++;
    }
    tokens.push({ text: text.slice(start, i), offset: start, isLabel: false });
  }

  return tokens;
}

/**
 * Rewrites a generic literal failure into the host-prefix diagnosis.
 */
function describeLiteralError(error: PatternError, text: string): PatternError {
  if (error.kind !== 'illegal_literal_character') {
    return error;
  }
  if (error.character === '{') {
    return createPatternError(
      'illegal_literal_character',
      `Unclosed label found in pattern \`${text}\`. Found segment \`${error.content}\``,
      error.content,
      text,
      '{'
    );
  }
  return createPatternError(
    'illegal_literal_character',
    `Literal segments must not contain \`}\` characters. Found segment \`${error.content}\``,
    error.content,
    text,
    '}'
  );
}

/**
 * Finds two label tokens with no literal characters between them.
 */
function findAdjacentLabels(tokens: readonly HostToken[], text: string): PatternError | undefined {
  for (let i = 1; i < tokens.length; i++) {
    const previous = tokens[i - 1];
    const current = tokens[i];
    if (previous?.isLabel === true && current?.isLabel === true) {
      return createPatternError(
        'adjacent_labels',
        `Host labels must not be adjacent. Found in pattern \`${text}\``,
        previous.text + current.text,
        text
      );
    }
  }
  return undefined;
}

/**
 * Parses a host-prefix template.
 *
 * @param text - Host prefix text (e.g. `{bucket}.s3-`).
 * @returns The validated pattern, or the first failure.
 *
 * @example
 * ```typescript
 * parseHostPrefix('foo-{baz}{bar}');
 * // { success: false, error: { kind: 'adjacent_labels', ... } }
 * ```
 */
export function parseHostPrefix(text: string): PatternResult<Pattern> {
  if (text.length === 0) {
    return failure(
      createPatternError('empty_segment', 'Host prefix patterns must not be empty', text, text)
    );
  }

  const tokens = tokenizeHostPrefix(text);
  const segments: Segment[] = [];
  for (const token of tokens) {
    const parsed = parseSegment(token.text, text);
    if (!parsed.success) {
      return failure(describeLiteralError(parsed.error, text));
    }
    segments.push(parsed.value);
  }

  const built = Pattern.build(text, segments, false);
  if (!built.success) {
    return built;
  }

  const adjacent = findAdjacentLabels(tokens, text);
  if (adjacent !== undefined) {
    return failure(adjacent);
  }

  return success(built.value);
}

/**
 * Parses a host-prefix template, throwing on failure.
 *
 * @throws {InvalidPatternError} When the template is invalid.
 */
export function parseHostPrefixOrThrow(text: string): Pattern {
  return unwrapPattern(parseHostPrefix(text));
}
