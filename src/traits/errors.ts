/**
 * Trait failure construction.
 *
 * @packageDocumentation
 */

import type { PatternError } from '../pattern/types.js';
import type { SourceLocation, TraitError, TraitId, TraitResult } from './types.js';

/**
 * Error class thrown by the `…OrThrow` trait constructors.
 */
export class TraitValidationError extends Error {
  /** The structured trait failure. */
  public readonly traitError: TraitError;

  /**
   * Creates a new TraitValidationError.
   *
   * @param traitError - The structured failure.
   */
  constructor(traitError: TraitError) {
    super(traitError.message);
    this.name = 'TraitValidationError';
    this.traitError = traitError;
  }
}

/**
 * Formats a source location as `file:line:column`.
 */
export function formatSourceLocation(location: SourceLocation): string {
  if (location.line === 0) {
    return location.filename;
  }
  return `${location.filename}:${String(location.line)}:${String(location.column)}`;
}

/**
 * Creates a trait error.
 *
 * @param traitId - Trait being created.
 * @param sourceLocation - Where the value was found.
 * @param detail - What was wrong with the value.
 * @param patternError - The underlying pattern failure, if any.
 * @returns A TraitError.
 */
export function createTraitError(
  traitId: TraitId,
  sourceLocation: SourceLocation,
  detail: string,
  patternError?: PatternError
): TraitError {
  const message = `${formatSourceLocation(sourceLocation)}: ${traitId}: ${detail}`;
  if (patternError !== undefined) {
    return { traitId, sourceLocation, patternError, message };
  }
  return { traitId, sourceLocation, message };
}

/**
 * Wraps a pattern failure into a failed trait result.
 */
export function traitPatternFailure<T>(
  traitId: TraitId,
  sourceLocation: SourceLocation,
  patternError: PatternError
): TraitResult<T> {
  return {
    success: false,
    error: createTraitError(traitId, sourceLocation, patternError.message, patternError),
  };
}

/**
 * Returns the trait of a result or throws its failure.
 *
 * @throws {TraitValidationError} When the result is a failure.
 */
export function unwrapTrait<T>(result: TraitResult<T>): T {
  if (!result.success) {
    throw new TraitValidationError(result.error);
  }
  return result.trait;
}
