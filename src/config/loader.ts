/**
 * Configuration file loader
 * Reads .sqlfrag/config.toml and merges with defaults
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { parse as parseTOML } from 'smol-toml';
import type { IdentifierQuoting, RenderOptions } from '../types.js';
import type { SqlFragConfig, RenderConfig, DebugConfig } from './types.js';
import { DEFAULT_CONFIG, IDENTIFIER_QUOTING_MODES, LOG_LEVEL_NAMES, defaultConfig } from './types.js';
import { DEBUG_ENV_VAR, DEFAULT_CONFIG_FOLDER } from '../constants.js';
import { debugLog, initDebugLogger } from '../utils/debug-logger.js';
import { ConfigValidationError, handleValidationError } from '../utils/error-handler.js';

/**
 * Default config file path (relative to project root)
 */
export const DEFAULT_CONFIG_PATH = `${DEFAULT_CONFIG_FOLDER}/config.toml`;

type TomlTable = Record<string, unknown>;

function isTable(value: unknown): value is TomlTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function stringField(table: TomlTable, key: string): string | undefined {
  const value = table[key];
  return typeof value === 'string' ? value : undefined;
}

function readRenderSection(root: TomlTable): RenderConfig {
  const section = root.render;
  if (!isTable(section)) return {};
  const identifier_quoting = stringField(section, 'identifier_quoting');
  return identifier_quoting === undefined ? {} : { identifier_quoting };
}

function readDebugSection(root: TomlTable): DebugConfig {
  const section = root.debug;
  if (!isTable(section)) return {};
  const debug: DebugConfig = {};
  const log_path = stringField(section, 'log_path');
  const log_level = stringField(section, 'log_level');
  if (log_path !== undefined) debug.log_path = log_path;
  if (log_level !== undefined) debug.log_level = log_level;
  return debug;
}

/**
 * Parse TOML text into a configuration merged with defaults.
 * Keys of the wrong type are ignored.
 */
export function parseConfig(content: string): SqlFragConfig {
  const parsed = parseTOML(content);

  return {
    render: {
      ...DEFAULT_CONFIG.render,
      ...readRenderSection(parsed),
    },
    debug: {
      ...DEFAULT_CONFIG.debug,
      ...readDebugSection(parsed),
    },
  };
}

/**
 * Load configuration from TOML file
 *
 * Priority: File config → Defaults
 *
 * @param configPath - Path to config file (optional, defaults to .sqlfrag/config.toml)
 */
export function loadConfigFile(configPath?: string): SqlFragConfig {
  const finalPath = configPath || DEFAULT_CONFIG_PATH;
  const absolutePath = resolve(process.cwd(), finalPath);

  if (!existsSync(absolutePath)) {
    return defaultConfig();
  }

  try {
    return parseConfig(readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`⚠️  Failed to load config file: ${finalPath}`);
    console.warn(`   Error: ${message}`);
    console.warn(`   Using default configuration`);
    return defaultConfig();
  }
}

function isIdentifierQuoting(value: string): value is IdentifierQuoting {
  return IDENTIFIER_QUOTING_MODES.some(mode => mode === value);
}

/**
 * Validate configuration values
 *
 * @returns Validation result with errors if any
 */
export function validateConfig(config: SqlFragConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  const quoting = config.render?.identifier_quoting;
  if (quoting !== undefined && !isIdentifierQuoting(quoting)) {
    errors.push(
      handleValidationError(
        'config.render',
        `render.identifier_quoting must be one of ${IDENTIFIER_QUOTING_MODES.join(', ')} (got "${quoting}")`
      )
    );
  }

  const level = config.debug?.log_level;
  if (level !== undefined && !LOG_LEVEL_NAMES.includes(level.toLowerCase())) {
    errors.push(
      handleValidationError(
        'config.debug',
        `debug.log_level must be one of ${LOG_LEVEL_NAMES.join(', ')} (got "${level}")`
      )
    );
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * @throws ConfigValidationError listing every invalid value
 */
export function assertValidConfig(config: SqlFragConfig): void {
  const { valid, errors } = validateConfig(config);
  if (!valid) {
    throw new ConfigValidationError(errors);
  }
}

/**
 * Render options described by the configuration
 * @throws ConfigValidationError when identifier_quoting is unknown
 */
export function toRenderOptions(config: SqlFragConfig): RenderOptions {
  const quoting = config.render?.identifier_quoting ?? DEFAULT_CONFIG.render?.identifier_quoting;
  if (quoting === undefined || !isIdentifierQuoting(quoting)) {
    throw new ConfigValidationError([`render.identifier_quoting must be one of ${IDENTIFIER_QUOTING_MODES.join(', ')}`]);
  }
  return { identifierQuoting: quoting };
}

/**
 * Start the debug logger described by the configuration.
 * SQLFRAG_DEBUG overrides debug.log_path.
 */
export function initFromConfig(config: SqlFragConfig): RenderOptions {
  assertValidConfig(config);

  const logPath = process.env[DEBUG_ENV_VAR] || config.debug?.log_path;
  initDebugLogger(logPath, config.debug?.log_level);

  const options = toRenderOptions(config);
  debugLog('INFO', 'Render options loaded', options);
  return options;
}
