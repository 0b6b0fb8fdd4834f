/**
 * The `http` trait: binds an operation to a method, URI template and
 * status code.
 *
 * @packageDocumentation
 */

import { UriPattern } from '../uri/uri-pattern.js';
import { createTraitError, traitPatternFailure, unwrapTrait } from './errors.js';
import { NO_SOURCE_LOCATION, type SourceLocation, type TraitResult } from './types.js';

/** Status code used when the document omits one. */
export const DEFAULT_HTTP_CODE = 200;

/** Regex pattern for an HTTP method token. */
const METHOD_PATTERN = /^[A-Z]+$/;

/**
 * Document value of the `http` trait.
 */
export interface HttpTraitNode {
  /** HTTP method, e.g. `GET`. */
  readonly method: string;
  /** URI template. */
  readonly uri: string;
  /** Success status code. */
  readonly code?: number;
}

/**
 * A validated `http` trait.
 */
export class HttpTrait {
  /** HTTP method. */
  public readonly method: string;
  /** Parsed URI template. */
  public readonly uri: UriPattern;
  /** Success status code. */
  public readonly code: number;
  /** Where the trait was declared. */
  public readonly sourceLocation: SourceLocation;

  private constructor(method: string, uri: UriPattern, code: number, sourceLocation: SourceLocation) {
    this.method = method;
    this.uri = uri;
    this.code = code;
    this.sourceLocation = sourceLocation;
  }

  /**
   * Creates the trait from its document value.
   *
   * @param node - Document value.
   * @param sourceLocation - Where the value was found.
   * @returns The trait, or why it is invalid.
   */
  static create(
    node: HttpTraitNode,
    sourceLocation: SourceLocation = NO_SOURCE_LOCATION
  ): TraitResult<HttpTrait> {
    if (!METHOD_PATTERN.test(node.method)) {
      return {
        success: false,
        error: createTraitError(
          'http',
          sourceLocation,
          `Invalid HTTP method '${node.method}': expected an upper-case token`
        ),
      };
    }

    const code = node.code ?? DEFAULT_HTTP_CODE;
    if (!Number.isInteger(code) || code < 100 || code > 599) {
      return {
        success: false,
        error: createTraitError(
          'http',
          sourceLocation,
          `Invalid HTTP code ${String(code)}: expected an integer between 100 and 599`
        ),
      };
    }

    const uri = UriPattern.parse(node.uri);
    if (!uri.success) {
      return traitPatternFailure('http', sourceLocation, uri.error);
    }

    return { success: true, trait: new HttpTrait(node.method, uri.value, code, sourceLocation) };
  }

  /**
   * Creates the trait, throwing on failure.
   *
   * @throws {TraitValidationError} When the value is invalid.
   */
  static createOrThrow(node: HttpTraitNode, sourceLocation?: SourceLocation): HttpTrait {
    return unwrapTrait(HttpTrait.create(node, sourceLocation));
  }

  /** The trait's document value. */
  toNode(): HttpTraitNode {
    return { method: this.method, uri: this.uri.toString(), code: this.code };
  }

  /** Traits are equal when their document values are equal. */
  equals(other: HttpTrait): boolean {
    return this.method === other.method && this.uri.equals(other.uri) && this.code === other.code;
  }
}
