/**
 * Shared types for pattern-bearing traits.
 *
 * @packageDocumentation
 */

import type { PatternError } from '../pattern/types.js';

/**
 * Trait identifiers understood by the loader.
 */
export type TraitId = 'http' | 'endpoint' | 'mqtt_publish' | 'mqtt_subscribe';

/**
 * Where a trait value was found in a model document.
 */
export interface SourceLocation {
  /** File name, or `N/A` when the value was built in code. */
  readonly filename: string;
  /** 1-based line, 0 when unknown. */
  readonly line: number;
  /** 1-based column, 0 when unknown. */
  readonly column: number;
}

/**
 * Location used for traits created in code.
 */
export const NO_SOURCE_LOCATION: SourceLocation = Object.freeze({
  filename: 'N/A',
  line: 0,
  column: 0,
});

/**
 * Failure to create a trait from its document value.
 */
export interface TraitError {
  /** Trait being created. */
  readonly traitId: TraitId;
  /** Where the trait value was found. */
  readonly sourceLocation: SourceLocation;
  /** The pattern failure, when the trait's template was invalid. */
  readonly patternError?: PatternError;
  /** Message prefixed with the source location and trait id. */
  readonly message: string;
}

/**
 * Outcome of creating a trait.
 */
export type TraitResult<T> =
  | { readonly success: true; readonly trait: T }
  | { readonly success: false; readonly error: TraitError };
