/**
 * sql-fragments - Entry Point
 *
 * Strongly-typed wrappers that render escaped SQL identifiers and literals:
 *
 *   `SELECT ${new Column('foo bar')} FROM ${new SchemaTable('foo', 'baz')}
 *    WHERE ${new Column('blah')} = ${new QuotedData("hello 'world' foo")}`
 *   // SELECT "foo bar" FROM foo.baz WHERE blah = 'hello ''world'' foo'
 */

export type {
  IdentifierQuoting,
  RenderOptions,
  SqlFragment,
  SqlText,
  ScalarType,
  Dialect,
} from './types.js';

export {
  quoteIdentifier,
  quoteLiteral,
  isPlainIdentifier,
  formatIdentifier,
  resolveRenderOptions,
} from './utils/escape.js';

export {
  Identifier,
  IdentifierConcat,
  Schema,
  Table,
  Column,
  SchemaTable,
} from './fragments/identifier.js';

export {
  QuotedData,
  QuotedDataConcat,
  MappedQuotedData,
  compareRaw,
} from './fragments/quoted-data.js';

export { ColumnType, ColumnSchema } from './fragments/column-schema.js';
export { Predicates, PredicateStatement } from './fragments/predicates.js';
export { sql, SqlTemplate } from './fragments/template.js';

export { SqlServerDialect, MonetDbDialect, sqlType, supportsType } from './dialects.js';

export {
  loadConfigFile,
  parseConfig,
  validateConfig,
  assertValidConfig,
  toRenderOptions,
  initFromConfig,
  DEFAULT_CONFIG_PATH,
} from './config/loader.js';
export type { SqlFragConfig, RenderConfig, DebugConfig } from './config/types.js';
export { DEFAULT_CONFIG, defaultConfig } from './config/types.js';

export {
  UnsupportedDataTypeError,
  ConfigValidationError,
} from './utils/error-handler.js';

export {
  initDebugLogger,
  closeDebugLogger,
  isDebugEnabled,
} from './utils/debug-logger.js';
export type { LogLevel } from './utils/debug-logger.js';

export { runQuery, queryRows, renderQuery, extractRows } from './utils/query-runner.js';
export type { Row } from './utils/query-runner.js';
