/**
 * Failure values and the exception wrapper for pattern parsing.
 *
 * @packageDocumentation
 */

import type { PatternError, PatternErrorKind, PatternResult } from './types.js';

/**
 * Error class for callers that prefer exceptions over result values.
 */
export class InvalidPatternError extends Error {
  /** The structured failure that caused this error. */
  public readonly patternError: PatternError;

  /**
   * Creates a new InvalidPatternError.
   *
   * @param patternError - The structured failure.
   */
  constructor(patternError: PatternError) {
    super(patternError.message);
    this.name = 'InvalidPatternError';
    this.patternError = patternError;
  }

  /** Failure category of the underlying error. */
  get kind(): PatternErrorKind {
    return this.patternError.kind;
  }
}

/**
 * Creates a pattern error.
 *
 * @param kind - Failure category.
 * @param message - Human-readable message.
 * @param content - Offending segment or label content.
 * @param source - Complete pattern text.
 * @param character - Offending brace for literal character failures.
 * @returns A PatternError.
 */
export function createPatternError(
  kind: PatternErrorKind,
  message: string,
  content: string,
  source: string,
  character?: '{' | '}'
): PatternError {
  if (character !== undefined) {
    return { kind, message, content, source, character };
  }
  return { kind, message, content, source };
}

/**
 * Creates a successful result.
 */
export function success<T>(value: T): PatternResult<T> {
  return { success: true, value };
}

/**
 * Creates a failed result.
 */
export function failure<T>(error: PatternError): PatternResult<T> {
  return { success: false, error };
}

/**
 * Returns the value of a result or throws its failure.
 *
 * @param result - A pattern result.
 * @returns The parsed value.
 * @throws {InvalidPatternError} When the result is a failure.
 */
export function unwrapPattern<T>(result: PatternResult<T>): T {
  if (!result.success) {
    throw new InvalidPatternError(result.error);
  }
  return result.value;
}
