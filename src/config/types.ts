/**
 * Configuration file type definitions
 * Defines the structure of .sqlfrag/config.toml
 */

import type { IdentifierQuoting } from '../types.js';

/**
 * Rendering defaults
 *
 * @example
 * [render]
 * identifier_quoting = "always"
 */
export interface RenderConfig {
  /**
   * "as-needed" leaves plain names bare, "always" quotes every identifier
   * @default "as-needed"
   */
  identifier_quoting?: string;
}

/**
 * Debug log settings
 *
 * @example
 * [debug]
 * log_path = ".sqlfrag/debug.log"
 * log_level = "debug"
 */
export interface DebugConfig {
  /**
   * Log file path; the SQLFRAG_DEBUG environment variable takes priority
   */
  log_path?: string;

  /**
   * One of fatal, error, warn, info, debug (case-insensitive)
   * @default "info"
   */
  log_level?: string;
}

/**
 * Complete configuration structure
 */
export interface SqlFragConfig {
  render?: RenderConfig;
  debug?: DebugConfig;
}

export const IDENTIFIER_QUOTING_MODES: readonly IdentifierQuoting[] = ['as-needed', 'always'];

export const LOG_LEVEL_NAMES: readonly string[] = ['fatal', 'error', 'warn', 'info', 'debug'];

/**
 * Default configuration values (frozen; see defaultConfig for an editable copy)
 */
export const DEFAULT_CONFIG: Readonly<SqlFragConfig> = Object.freeze({
  render: Object.freeze({
    identifier_quoting: 'as-needed',
  }),
  debug: Object.freeze({
    log_level: 'info',
  }),
});

/**
 * Fresh copy of the default configuration
 */
export function defaultConfig(): SqlFragConfig {
  return {
    render: { ...DEFAULT_CONFIG.render },
    debug: { ...DEFAULT_CONFIG.debug },
  };
}
