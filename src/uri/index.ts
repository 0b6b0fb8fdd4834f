/**
 * HTTP URI dialect.
 *
 * @packageDocumentation
 */

export { UriPattern, parseUriPattern, parseUriPatternOrThrow } from './uri-pattern.js';
