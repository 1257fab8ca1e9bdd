/**
 * Centralized error handling for sql-fragments
 *
 * Rendering never fails; errors only come from dialect lookups, configuration
 * and query execution. Stack traces go to the debug log, callers get messages.
 */

import type { ScalarType } from '../types.js';
import { debugLog, debugLogError } from './debug-logger.js';

// ============================================================================
// Error Types
// ============================================================================

/**
 * Dialect has no SQL type for the requested scalar
 */
export class UnsupportedDataTypeError extends Error {
  constructor(readonly dialect: string, readonly scalar: ScalarType) {
    super(`Dialect ${dialect} has no SQL type for ${scalar}`);
    this.name = 'UnsupportedDataTypeError';
  }
}

/**
 * Configuration failed validation
 */
export class ConfigValidationError extends Error {
  constructor(readonly errors: string[]) {
    super(`Invalid configuration: ${errors.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

// ============================================================================
// Handlers
// ============================================================================

/**
 * Format error details for logging and reporting
 */
export function formatErrorDetails(error: unknown): {
  message: string;
  stack?: string;
  errorType: string;
} {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack, errorType: error.constructor.name };
  }
  return { message: String(error), errorType: typeof error };
}

/**
 * Handle query execution errors
 * Logs the error with the SQL that failed and returns the message
 */
export function handleQueryError(context: string, error: unknown, sql: string): string {
  const { message, stack, errorType } = formatErrorDetails(error);

  debugLogError(`Query ${context}`, error, {
    sql,
    errorType,
    stack,
  });

  return message;
}

/**
 * Handle validation errors
 * Returns user-friendly error message
 */
export function handleValidationError(context: string, validationMessage: string): string {
  debugLog('WARN', `Validation error in ${context}`, {
    validation: validationMessage,
  });

  return validationMessage;
}
