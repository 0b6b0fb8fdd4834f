/**
 * Validated, immutable sequence of segments.
 *
 * Labels must not be repeated (case-insensitively). Greedy labels, when the
 * dialect allows them, may appear at most once and must be the last label;
 * literals may still follow. When the dialect forbids greedy labels, any
 * greedy label is rejected.
 *
 * @packageDocumentation
 */

import { asciiLowerCase } from './chars.js';
import { createPatternError, failure, success } from './errors.js';
import { createSegment, isGreedyLabel, isLabel } from './segment.js';
import type { PatternError, PatternResult, Segment } from './types.js';

/**
 * Finds the first label whose case-folded name was already seen.
 *
 * @param labels - Label segments (or topic levels) in order.
 * @param source - Complete pattern text.
 * @returns A `duplicate_label` failure, or undefined when names are unique.
 */
export function findDuplicateLabel(
  labels: readonly { readonly content: string }[],
  source: string
): PatternError | undefined {
  const seen = new Set<string>();
  for (const label of labels) {
    const key = asciiLowerCase(label.content);
    if (seen.has(key)) {
      return createPatternError(
        'duplicate_label',
        `Label \`${label.content}\` is defined more than once in pattern: ${source}`,
        label.content,
        source
      );
    }
    seen.add(key);
  }
  return undefined;
}

/**
 * Checks greedy label placement for dialects that allow greedy labels.
 */
function checkGreedyPlacement(segments: readonly Segment[], source: string): PatternError | undefined {
  const greedyIndex = segments.findIndex(isGreedyLabel);
  if (greedyIndex === -1) {
    return undefined;
  }
  const greedy = segments[greedyIndex];
  for (const later of segments.slice(greedyIndex + 1)) {
    if (isGreedyLabel(later)) {
      return createPatternError(
        'multiple_greedy_labels',
        `At most one greedy label segment may exist in a pattern: ${source}`,
        later.content,
        source
      );
    }
    if (isLabel(later)) {
      return createPatternError(
        'greedy_label_not_last',
        `A greedy label must be the last label in its pattern: ${source}`,
        greedy?.content ?? later.content,
        source
      );
    }
  }
  return undefined;
}

/**
 * A parsed pattern.
 *
 * Instances are only created through {@link Pattern.build}, which either
 * returns a fully validated pattern or the first failure found.
 *
 * @example
 * ```typescript
 * const result = Pattern.build('{bucket}.', segments, false);
 * if (result.success) {
 *   result.value.label('BUCKET')?.content; // 'bucket'
 * }
 * ```
 */
export class Pattern {
  private readonly source: string;
  private readonly segmentList: readonly Segment[];
  private readonly labelList: readonly Segment[];

  /** Whether this pattern's dialect permits greedy labels. */
  public readonly allowsGreedyLabels: boolean;

  private constructor(source: string, segments: readonly Segment[], allowsGreedyLabels: boolean) {
    this.source = source;
    this.segmentList = Object.freeze([...segments]);
    this.labelList = Object.freeze(this.segmentList.filter(isLabel));
    this.allowsGreedyLabels = allowsGreedyLabels;
  }

  /**
   * Validates segments and builds a pattern.
   *
   * @param source - The original pattern text.
   * @param segments - Segments already split and parsed by the dialect.
   * @param allowsGreedyLabels - Whether the dialect permits greedy labels.
   * @returns The pattern, or the first validation failure.
   */
  static build(
    source: string,
    segments: readonly Segment[],
    allowsGreedyLabels: boolean
  ): PatternResult<Pattern> {
    // Re-validated here; `text` is derived from kind and content.
    const checked: Segment[] = [];
    for (const segment of segments) {
      const rebuilt = createSegment(segment.kind, segment.content, source);
      if (!rebuilt.success) {
        return rebuilt;
      }
      checked.push(rebuilt.value);
    }

    const duplicate = findDuplicateLabel(checked.filter(isLabel), source);
    if (duplicate !== undefined) {
      return failure(duplicate);
    }

    if (allowsGreedyLabels) {
      const placement = checkGreedyPlacement(checked, source);
      if (placement !== undefined) {
        return failure(placement);
      }
    } else {
      const greedy = checked.find(isGreedyLabel);
      if (greedy !== undefined) {
        return failure(
          createPatternError(
            'greedy_label_not_allowed',
            `Pattern must not contain a greedy label. Found ${source}`,
            greedy.content,
            source
          )
        );
      }
    }

    return success(new Pattern(source, checked, allowsGreedyLabels));
  }

  /** All segments, in order. */
  segments(): readonly Segment[] {
    return this.segmentList;
  }

  /** Label segments (greedy included), in order. */
  labels(): readonly Segment[] {
    return this.labelList;
  }

  /**
   * Gets a label by case-insensitive name.
   *
   * @param name - Label name to look up.
   * @returns The label segment, or undefined.
   */
  label(name: string): Segment | undefined {
    const key = asciiLowerCase(name);
    return this.labelList.find((segment) => asciiLowerCase(segment.content) === key);
  }

  /** The greedy label, if present. */
  greedyLabel(): Segment | undefined {
    return this.segmentList.find(isGreedyLabel);
  }

  /**
   * Concatenates each segment's rendered form.
   */
  render(separator = ''): string {
    return this.segmentList.map((segment) => segment.text).join(separator);
  }

  /**
   * Patterns are equal when parsed from the same text.
   */
  equals(other: Pattern): boolean {
    return this.source === other.source;
  }

  /** The original pattern text. */
  toString(): string {
    return this.source;
  }
}
