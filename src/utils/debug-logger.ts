/**
 * Debug Logger for sql-fragments
 *
 * Disabled by default. Enabled via environment variable or config file.
 * Priority: Environment variable > Config file
 *
 * Usage:
 *   SQLFRAG_DEBUG=/path/to/debug.log node app.js
 *   OR set debug.log_path in .sqlfrag/config.toml
 */

import * as fs from 'fs';
import * as path from 'path';
import { DEBUG_ENV_VAR } from '../constants.js';

export type LogLevel = 'FATAL' | 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

let debugEnabled = false;
let debugStream: fs.WriteStream | null = null;
let currentLogPath: string | null = null;
let currentLogLevel: LogLevel = 'INFO';

// Higher number = more verbose
const LOG_LEVELS: Record<LogLevel, number> = {
  FATAL: 0,
  ERROR: 1,
  WARN: 2,
  INFO: 3,
  DEBUG: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] <= LOG_LEVELS[currentLogLevel];
}

/**
 * Initialize debug logger
 * @param debugLogPath - Log path (already resolved with priority: env > config)
 * @param logLevel - Log level (case-insensitive: "error", "warn", "info", "debug")
 */
export function initDebugLogger(debugLogPath?: string, logLevel?: string): void {
  if (!debugLogPath) {
    return;
  }

  if (debugStream) {
    debugStream.end();
    debugStream = null;
  }

  currentLogPath = debugLogPath;
  currentLogLevel = 'INFO';

  if (logLevel) {
    const upperLevel = logLevel.toUpperCase();
    if (isLogLevel(upperLevel)) {
      currentLogLevel = upperLevel;
    }
  }

  try {
    const logDir = path.dirname(debugLogPath);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    debugStream = fs.createWriteStream(debugLogPath, { flags: 'a' });
    debugEnabled = true;

    const source = process.env[DEBUG_ENV_VAR] === debugLogPath ? 'Environment Variable' : 'Config File';

    debugLog('INFO', 'sql-fragments Debug Log Started');
    debugLog('INFO', `Process ID: ${process.pid}`);
    debugLog('INFO', `Debug Log Path: ${debugLogPath}`);
    debugLog('INFO', `Log Level: ${currentLogLevel}`);
    debugLog('INFO', `Source: ${source}`);
  } catch (error) {
    console.error(`Failed to initialize debug logger: ${error}`);
    debugEnabled = false;
  }
}

/**
 * Collapse newlines so every entry stays on one line
 */
function sanitizeForSingleLine(str: string): string {
  return str.replace(/\r?\n/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Write debug log entry (always single-line format)
 * @param data - Optional data, serialized as JSON unless already a string
 */
export function debugLog(level: LogLevel, message: string, data?: unknown): void {
  if (!debugEnabled || !debugStream) {
    return;
  }

  if (!shouldLog(level)) {
    return;
  }

  const timestamp = new Date().toISOString();
  let logEntry = `[${timestamp}] [${level}] ${sanitizeForSingleLine(message)}`;

  try {
    if (data !== undefined) {
      const dataStr = typeof data === 'string'
        ? sanitizeForSingleLine(data)
        : sanitizeForSingleLine(JSON.stringify(data));
      logEntry += ` | Data: ${dataStr}`;
    }

    debugStream.write(logEntry + '\n');
  } catch (error) {
    console.error(`Failed to write debug log: ${error}`);
  }
}

/**
 * Log error with stack trace
 * @param context - Error context/description
 * @param level - FATAL for system-critical, ERROR for application errors
 */
export function debugLogError(
  context: string,
  error: unknown,
  additionalContext?: Record<string, unknown>,
  level: 'FATAL' | 'ERROR' = 'ERROR'
): void {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  debugLog(level, `${context}: ${errorMessage}`, {
    stack,
    ...additionalContext,
  });
}

/**
 * Log rendered SQL execution
 */
export function debugLogQuery(context: string, sql: string, duration?: number): void {
  if (!debugEnabled) return;

  const logData: { sql: string; duration_ms?: number } = {
    sql: sql.replace(/\s+/g, ' ').trim(),
  };

  if (duration !== undefined) {
    logData.duration_ms = duration;
  }

  debugLog('DEBUG', `DB Query [${context}]`, logData);
}

/**
 * Close debug logger; resolves once buffered entries are flushed
 */
export function closeDebugLogger(): Promise<void> {
  const stream = debugStream;
  if (!stream) {
    return Promise.resolve();
  }

  debugLog('INFO', 'sql-fragments Debug Log Ended');
  debugStream = null;
  debugEnabled = false;
  currentLogPath = null;

  return new Promise((resolve, reject) => {
    stream.once('error', reject);
    stream.end(() => resolve());
  });
}

/**
 * Check if debug logging is enabled
 */
export function isDebugEnabled(): boolean {
  return debugEnabled;
}

/**
 * Current log file, or null when disabled
 */
export function getDebugLogPath(): string | null {
  return currentLogPath;
}
