/**
 * Escaping primitives
 * Every fragment type renders through one of the two quoting functions below.
 */

import type { IdentifierQuoting, RenderOptions } from '../types.js';
import {
  DEFAULT_RENDER_OPTIONS,
  IDENTIFIER_QUOTE,
  LITERAL_QUOTE,
  PLAIN_IDENTIFIER,
} from '../constants.js';

/**
 * Quote an identifier (table, schema, column name).
 * Wrapped in double quotes; embedded double quotes are doubled.
 *
 * Example: `foo"--DROP TABLE bar` becomes `"foo""--DROP TABLE bar"`
 */
export function quoteIdentifier(name: string): string {
  return `${IDENTIFIER_QUOTE}${name.replaceAll(IDENTIFIER_QUOTE, '""')}${IDENTIFIER_QUOTE}`;
}

/**
 * Quote a string literal.
 * Wrapped in single quotes; embedded single quotes are doubled.
 * Backslashes pass through untouched.
 */
export function quoteLiteral(value: string): string {
  return `${LITERAL_QUOTE}${value.replaceAll(LITERAL_QUOTE, "''")}${LITERAL_QUOTE}`;
}

/**
 * True when the name can appear unquoted under 'as-needed' quoting
 */
export function isPlainIdentifier(name: string): boolean {
  return PLAIN_IDENTIFIER.test(name);
}

/**
 * Render an identifier according to the quoting mode.
 *
 * 'as-needed' does not check for reserved words: `order` or `select` stay
 * bare and will not parse as names. Render with `identifierQuoting: 'always'`
 * when a name may be a keyword.
 */
export function formatIdentifier(name: string, quoting: IdentifierQuoting = 'as-needed'): string {
  if (quoting === 'as-needed' && isPlainIdentifier(name)) {
    return name;
  }
  return quoteIdentifier(name);
}

/**
 * Fill unspecified render options with defaults
 */
export function resolveRenderOptions(options?: Partial<RenderOptions>): RenderOptions {
  return {
    identifierQuoting: options?.identifierQuoting ?? DEFAULT_RENDER_OPTIONS.identifierQuoting,
  };
}
