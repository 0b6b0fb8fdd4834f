/**
 * HTTP URI templates, e.g. `/buckets/{bucket}/objects/{key+}?list`.
 *
 * The path is split on `/` and each segment is parsed with the shared
 * segment grammar; greedy labels are allowed. The optional query string
 * holds literal `key=value` pairs only.
 *
 * @packageDocumentation
 */

import { createPatternError, failure, success, unwrapPattern } from '../pattern/errors.js';
import { Pattern } from '../pattern/pattern.js';
import { parseSegment } from '../pattern/segment.js';
import type { PatternResult, Segment } from '../pattern/types.js';

/**
 * Parses the query string into literal key/value pairs.
 */
function parseQueryLiterals(query: string, text: string): PatternResult<Map<string, string>> {
  const literals = new Map<string, string>();
  if (query.includes('{') || query.includes('}')) {
    return failure(
      createPatternError(
        'label_in_query_string',
        `URI labels must not appear in the query string. Found ${text}`,
        query,
        text
      )
    );
  }

  for (const pair of query.split('&')) {
    const eq = pair.indexOf('=');
    const key = eq === -1 ? pair : pair.slice(0, eq);
    const value = eq === -1 ? '' : pair.slice(eq + 1);
    if (literals.has(key)) {
      return failure(
        createPatternError(
          'duplicate_query_literal',
          `Literal query parameters must not be repeated: ${text}`,
          key,
          text
        )
      );
    }
    literals.set(key, value);
  }

  return success(literals);
}

/**
 * A parsed URI template.
 */
export class UriPattern {
  /** The generic pattern over the path segments. */
  public readonly pattern: Pattern;
  private readonly query: ReadonlyMap<string, string>;

  private constructor(pattern: Pattern, query: ReadonlyMap<string, string>) {
    this.pattern = pattern;
    this.query = query;
  }

  /**
   * Parses a URI template.
   *
   * @param text - URI template text, starting with `/`.
   * @returns The parsed template, or the first failure.
   */
  static parse(text: string): PatternResult<UriPattern> {
    if (!text.startsWith('/')) {
      return failure(
        createPatternError('invalid_uri', `URI pattern must start with '/'. Found ${text}`, text, text)
      );
    }
    if (text.endsWith('?')) {
      return failure(
        createPatternError('invalid_uri', `URI patterns must not end with '?'. Found ${text}`, text, text)
      );
    }
    if (text.includes('#')) {
      return failure(
        createPatternError('invalid_uri', `URI pattern must not contain a fragment. Found ${text}`, text, text)
      );
    }

    const queryStart = text.indexOf('?');
    const path = queryStart === -1 ? text : text.slice(0, queryStart);

    // Tokens after the leading '/'; a single trailing '/' adds no segment.
    const tokens = path.slice(1).split('/');
    if (tokens.length > 0 && tokens[tokens.length - 1] === '') {
      tokens.pop();
    }

    const segments: Segment[] = [];
    for (const token of tokens) {
      const parsed = parseSegment(token, text);
      if (!parsed.success) {
        return parsed;
      }
      segments.push(parsed.value);
    }

    const built = Pattern.build(text, segments, true);
    if (!built.success) {
      return built;
    }

    let query = new Map<string, string>();
    if (queryStart !== -1) {
      const literals = parseQueryLiterals(text.slice(queryStart + 1), text);
      if (!literals.success) {
        return literals;
      }
      query = literals.value;
    }

    return success(new UriPattern(built.value, query));
  }

  /** Path segments, in order. */
  segments(): readonly Segment[] {
    return this.pattern.segments();
  }

  /** Path labels, in order. */
  labels(): readonly Segment[] {
    return this.pattern.labels();
  }

  /** Gets a path label by case-insensitive name. */
  label(name: string): Segment | undefined {
    return this.pattern.label(name);
  }

  /** The greedy path label, if present. */
  greedyLabel(): Segment | undefined {
    return this.pattern.greedyLabel();
  }

  /** Literal query parameters, as a copy; a key without `=` maps to `''`. */
  queryLiterals(): ReadonlyMap<string, string> {
    return new Map(this.query);
  }

  /**
   * Rebuilds the template from its parsed parts.
   */
  render(): string {
    const path = '/' + this.pattern.render('/');
    if (this.query.size === 0) {
      return path;
    }
    const pairs = [...this.query].map(([key, value]) => (value === '' ? key : `${key}=${value}`));
    return `${path}?${pairs.join('&')}`;
  }

  /**
   * Checks whether two templates could match the same request path.
   *
   * Templates with different query literals never conflict. Otherwise the
   * segments are compared pairwise: a label against a literal, or a greedy
   * label against a non-greedy one, is a conflict; two different literals
   * are not. Without a decision, templates of equal length conflict.
   *
   * @param other - Template to compare with.
   * @returns True if the templates conflict.
   */
  conflictsWith(other: UriPattern): boolean {
    if (!sameQueryLiterals(this.query, other.query)) {
      return false;
    }

    const mine = this.segments();
    const theirs = other.segments();
    const shared = Math.min(mine.length, theirs.length);

    for (let i = 0; i < shared; i++) {
      const a = mine[i];
      const b = theirs[i];
      if (a === undefined || b === undefined) {
        break;
      }
      if ((a.kind === 'literal') !== (b.kind === 'literal')) {
        return true;
      }
      if ((a.kind === 'greedy_label') !== (b.kind === 'greedy_label')) {
        return true;
      }
      if (a.kind === 'literal' && a.content !== b.content) {
        return false;
      }
    }

    return mine.length === theirs.length;
  }

  /** Templates are equal when parsed from the same text. */
  equals(other: UriPattern): boolean {
    return this.pattern.equals(other.pattern);
  }

  /** The original template text. */
  toString(): string {
    return this.pattern.toString();
  }
}

function sameQueryLiterals(a: ReadonlyMap<string, string>, b: ReadonlyMap<string, string>): boolean {
  if (a.size !== b.size) {
    return false;
  }
  for (const [key, value] of a) {
    if (b.get(key) !== value) {
      return false;
    }
  }
  return true;
}

/**
 * Parses a URI template.
 */
export function parseUriPattern(text: string): PatternResult<UriPattern> {
  return UriPattern.parse(text);
}

/**
 * Parses a URI template, throwing on failure.
 *
 * @throws {InvalidPatternError} When the template is invalid.
 */
export function parseUriPatternOrThrow(text: string): UriPattern {
  return unwrapPattern(UriPattern.parse(text));
}
