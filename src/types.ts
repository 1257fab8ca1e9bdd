/**
 * Type definitions for sql-fragments
 * Rendering contracts shared by every fragment type
 */

// ============================================================================
// Rendering
// ============================================================================

/**
 * How identifiers are quoted when rendered
 * - as-needed: bare when the name is a plain identifier, quoted otherwise
 * - always: every identifier is wrapped in double quotes
 */
export type IdentifierQuoting = 'as-needed' | 'always';

/**
 * Options accepted by every fragment's render()
 */
export interface RenderOptions {
  identifierQuoting: IdentifierQuoting;
}

/**
 * A value that renders to escaped SQL text.
 *
 * toString() renders with default options, so fragments can be placed
 * directly in template literals.
 */
export interface SqlFragment {
  render(options?: Partial<RenderOptions>): string;
  toString(): string;
}

/**
 * Anything that can stand in a predicate list: raw SQL text or a fragment
 */
export type SqlText = string | SqlFragment;

// ============================================================================
// Dialects
// ============================================================================

/**
 * Host-language scalar kinds that dialects map to SQL column types
 */
export type ScalarType =
  | 'boolean'
  | 'int8'
  | 'int16'
  | 'int32'
  | 'int64'
  | 'float32'
  | 'float64'
  | 'string';

/**
 * SQL dialect descriptor
 */
export interface Dialect {
  readonly name: string;
  readonly dataTypes: Readonly<Partial<Record<ScalarType, string>>>;
}
