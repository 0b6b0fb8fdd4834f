/**
 * The `endpoint` trait: a host prefix prepended to the service endpoint.
 *
 * @packageDocumentation
 */

import { parseHostPrefix } from '../host/host-prefix.js';
import type { Pattern } from '../pattern/pattern.js';
import { traitPatternFailure, unwrapTrait } from './errors.js';
import { NO_SOURCE_LOCATION, type SourceLocation, type TraitResult } from './types.js';

/**
 * Document value of the `endpoint` trait.
 */
export interface EndpointTraitNode {
  /** Host prefix template, e.g. `{accountId}.data-`. */
  readonly host_prefix: string;
}

/**
 * A validated `endpoint` trait.
 */
export class EndpointTrait {
  /** Parsed host prefix. */
  public readonly hostPrefix: Pattern;
  /** Where the trait was declared. */
  public readonly sourceLocation: SourceLocation;

  private constructor(hostPrefix: Pattern, sourceLocation: SourceLocation) {
    this.hostPrefix = hostPrefix;
    this.sourceLocation = sourceLocation;
  }

  /**
   * Creates the trait from its document value.
   *
   * @param node - Document value.
   * @param sourceLocation - Where the value was found.
   * @returns The trait, or why the host prefix is invalid.
   */
  static create(
    node: EndpointTraitNode,
    sourceLocation: SourceLocation = NO_SOURCE_LOCATION
  ): TraitResult<EndpointTrait> {
    const hostPrefix = parseHostPrefix(node.host_prefix);
    if (!hostPrefix.success) {
      return traitPatternFailure('endpoint', sourceLocation, hostPrefix.error);
    }
    return { success: true, trait: new EndpointTrait(hostPrefix.value, sourceLocation) };
  }

  /**
   * Creates the trait, throwing on failure.
   *
   * @throws {TraitValidationError} When the host prefix is invalid.
   */
  static createOrThrow(node: EndpointTraitNode, sourceLocation?: SourceLocation): EndpointTrait {
    return unwrapTrait(EndpointTrait.create(node, sourceLocation));
  }

  /** The trait's document value. */
  toNode(): EndpointTraitNode {
    return { host_prefix: this.hostPrefix.toString() };
  }

  /** Traits are equal when their host prefixes are equal. */
  equals(other: EndpointTrait): boolean {
    return this.hostPrefix.equals(other.hostPrefix);
  }
}
