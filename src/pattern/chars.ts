/**
 * Locale-independent character helpers for label names.
 *
 * @packageDocumentation
 */

const UPPER_A = 0x41;
const UPPER_Z = 0x5a;
const LOWER_A = 0x61;
const LOWER_Z = 0x7a;
const DIGIT_0 = 0x30;
const DIGIT_9 = 0x39;
const UNDERSCORE = 0x5f;
const CASE_OFFSET = LOWER_A - UPPER_A;

/**
 * Lower-cases ASCII letters only; every other code unit is kept as is.
 *
 * @param value - Text to fold.
 * @returns The folded text.
 */
export function asciiLowerCase(value: string): string {
  let folded = '';
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    folded +=
      code >= UPPER_A && code <= UPPER_Z ? String.fromCharCode(code + CASE_OFFSET) : value.charAt(i);
  }
  return folded;
}

/**
 * Checks whether a code unit is allowed in a label name (`[A-Za-z0-9_]`).
 */
export function isLabelNameCode(code: number): boolean {
  return (
    (code >= UPPER_A && code <= UPPER_Z) ||
    (code >= LOWER_A && code <= LOWER_Z) ||
    (code >= DIGIT_0 && code <= DIGIT_9) ||
    code === UNDERSCORE
  );
}

/**
 * Checks whether a string is a valid, non-empty label name.
 *
 * @param name - Candidate label name.
 * @returns True when every character is in `[A-Za-z0-9_]`.
 */
export function isValidLabelName(name: string): boolean {
  if (name.length === 0) {
    return false;
  }
  for (let i = 0; i < name.length; i++) {
    if (!isLabelNameCode(name.charCodeAt(i))) {
      return false;
    }
  }
  return true;
}

/**
 * Returns the first `{` or `}` in a string, if any.
 */
export function findBrace(value: string): '{' | '}' | undefined {
  for (const ch of value) {
    if (ch === '{' || ch === '}') {
      return ch;
    }
  }
  return undefined;
}
