/**
 * SQL dialect descriptors
 * Maps host scalar kinds to each dialect's column type names
 */

import type { Dialect, ScalarType } from './types.js';
import { UnsupportedDataTypeError } from './utils/error-handler.js';

export const SqlServerDialect = {
  name: 'sqlserver',
  dataTypes: {
    boolean: 'BIT',
    int8: 'TINYINT',
    int16: 'SMALLINT',
    int32: 'INT',
    int64: 'BIGINT',
    float32: 'REAL',
    float64: 'FLOAT',
    string: 'NVARCHAR',
  },
} as const satisfies Dialect;

// MonetDB has no single-precision float type
export const MonetDbDialect = {
  name: 'monetdb',
  dataTypes: {
    boolean: 'BOOLEAN',
    int8: 'TINYINT',
    int16: 'SMALLINT',
    int32: 'INT',
    int64: 'BIGINT',
    float64: 'DOUBLE',
    string: 'STRING',
  },
} as const satisfies Dialect;

export type SqlServerDialect = typeof SqlServerDialect;
export type MonetDbDialect = typeof MonetDbDialect;

/**
 * Look up the SQL type name for a scalar kind
 * @throws UnsupportedDataTypeError when the dialect has no mapping
 */
export function sqlType(dialect: Dialect, scalar: ScalarType): string {
  const name = dialect.dataTypes[scalar];
  if (name === undefined) {
    throw new UnsupportedDataTypeError(dialect.name, scalar);
  }
  return name;
}

/**
 * True when the dialect maps the scalar kind
 */
export function supportsType(dialect: Dialect, scalar: ScalarType): boolean {
  return dialect.dataTypes[scalar] !== undefined;
}
