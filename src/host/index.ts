/**
 * Host-prefix dialect.
 *
 * @packageDocumentation
 */

export { parseHostPrefix, parseHostPrefixOrThrow, tokenizeHostPrefix } from './host-prefix.js';
export type { HostToken } from './host-prefix.js';
