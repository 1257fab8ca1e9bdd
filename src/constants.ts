/**
 * Constants for sql-fragments
 * Quote characters, identifier patterns and default values
 */

import type { RenderOptions } from './types.js';

// ============================================================================
// Quoting
// ============================================================================

/**
 * ANSI identifier quote
 */
export const IDENTIFIER_QUOTE = '"';

/**
 * ANSI string literal quote
 */
export const LITERAL_QUOTE = "'";

/**
 * Names matching this pattern are left bare under 'as-needed' quoting
 */
export const PLAIN_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Separator between schema and table in a qualified name
 */
export const SCHEMA_SEPARATOR = '.';

/**
 * Joins predicates inside a WHERE statement
 */
export const PREDICATE_SEPARATOR = '\nAND ';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_RENDER_OPTIONS: Readonly<RenderOptions> = {
  identifierQuoting: 'as-needed',
};

/**
 * Default config folder (relative to project root)
 */
export const DEFAULT_CONFIG_FOLDER = '.sqlfrag';

/**
 * Environment variable that enables the debug log (value = log path)
 */
export const DEBUG_ENV_VAR = 'SQLFRAG_DEBUG';
