/**
 * Finds where operation keys appear in model source text.
 *
 * TOML parsers return plain values without positions, so trait locations
 * are recovered by scanning the text for the operation's table header and
 * the key inside it.
 *
 * @packageDocumentation
 */

import type { SourceLocation } from '../traits/types.js';

/**
 * Checks whether a line is the table header of an operation.
 */
function isOperationHeader(line: string, operation: string): boolean {
  const trimmed = line.trim();
  return (
    trimmed === `[operations.${operation}]` ||
    trimmed === `[operations."${operation}"]` ||
    trimmed === `[ operations.${operation} ]`
  );
}

/**
 * Locates a key inside an operation's table.
 *
 * @param source - Model source text.
 * @param filename - File name for the location.
 * @param operation - Operation name.
 * @param key - Key to find; when omitted, the header itself is located.
 * @returns 1-based line and column, or line 0 when not found.
 */
export function locateOperationKey(
  source: string,
  filename: string,
  operation: string,
  key?: string
): SourceLocation {
  const lines = source.split(/\r?\n/);
  const header = lines.findIndex((line) => isOperationHeader(line, operation));
  if (header === -1) {
    return { filename, line: 0, column: 0 };
  }

  const headerLine = lines[header] ?? '';
  if (key === undefined) {
    return { filename, line: header + 1, column: headerLine.indexOf('[') + 1 };
  }

  for (let i = header + 1; i < lines.length; i++) {
    const line = lines[i] ?? '';
    const trimmed = line.trimStart();
    if (trimmed.startsWith('[')) {
      break;
    }
    if (trimmed.startsWith(key)) {
      const rest = trimmed.slice(key.length).trimStart();
      if (rest.startsWith('=')) {
        return { filename, line: i + 1, column: line.length - trimmed.length + 1 };
      }
    }
  }

  return { filename, line: header + 1, column: headerLine.indexOf('[') + 1 };
}
