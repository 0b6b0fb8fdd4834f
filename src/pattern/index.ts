/**
 * Segmented pattern language: segments, patterns and their failures.
 *
 * @packageDocumentation
 */

export type { PatternError, PatternErrorKind, PatternResult, Segment, SegmentKind } from './types.js';
export {
  InvalidPatternError,
  createPatternError,
  failure,
  success,
  unwrapPattern,
} from './errors.js';
export { asciiLowerCase, isValidLabelName } from './chars.js';
export {
  LABEL_NAME_GRAMMAR,
  compareSegments,
  createSegment,
  isGreedyLabel,
  isLabel,
  parseSegment,
  segmentEquals,
} from './segment.js';
export { Pattern, findDuplicateLabel } from './pattern.js';
