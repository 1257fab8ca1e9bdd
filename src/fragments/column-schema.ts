/**
 * Column definition fragments, e.g. `"display name" NVARCHAR`
 */

import type { Dialect, RenderOptions, ScalarType, SqlFragment } from '../types.js';
import { sqlType } from '../dialects.js';
import { quoteIdentifier, resolveRenderOptions } from '../utils/escape.js';
import { Column } from './identifier.js';

const QUOTED_TYPE_NAME = /[\s"]/;

/**
 * Column type name for a given SQL dialect.
 *
 * Type names are written bare, parameters included (`DECIMAL(10,2)`), and
 * ignore the statement's identifier quoting. Only a name containing
 * whitespace or `"` is quoted.
 */
export class ColumnType<D extends Dialect> implements SqlFragment {
  constructor(readonly dialect: D, readonly name: string) {}

  /**
   * Type of the given scalar kind in the dialect
   * @throws UnsupportedDataTypeError when the dialect has no mapping
   */
  static of<D extends Dialect>(dialect: D, scalar: ScalarType): ColumnType<D> {
    return new ColumnType(dialect, sqlType(dialect, scalar));
  }

  asString(): string {
    return this.name;
  }

  render(): string {
    return QUOTED_TYPE_NAME.test(this.name) ? quoteIdentifier(this.name) : this.name;
  }

  toString(): string {
    return this.render();
  }
}

/**
 * Column name and type for a given SQL dialect
 */
export class ColumnSchema<D extends Dialect> implements SqlFragment {
  private readonly columnPart: Column;

  constructor(column: Column | string, private readonly typePart: ColumnType<D>) {
    this.columnPart = typeof column === 'string' ? new Column(column) : column;
  }

  /**
   * Build from a scalar kind, e.g. ColumnSchema.of(MonetDbDialect, 'id', 'int64')
   */
  static of<D extends Dialect>(dialect: D, column: Column | string, scalar: ScalarType): ColumnSchema<D> {
    return new ColumnSchema(column, ColumnType.of(dialect, scalar));
  }

  /**
   * Gets `Column` part
   */
  column(): Column {
    return this.columnPart;
  }

  /**
   * Gets `ColumnType` part
   */
  columnType(): ColumnType<D> {
    return this.typePart;
  }

  render(options?: Partial<RenderOptions>): string {
    return `${this.columnPart.render(resolveRenderOptions(options))} ${this.typePart.render()}`;
  }

  toString(): string {
    return this.render();
  }
}
