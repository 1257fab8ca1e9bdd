/**
 * Identifier fragments: schemas, tables, columns and qualified names
 *
 * All identifiers share the same escaping rules:
 * - as-is, if the name is a plain identifier (letters, digits, underscore)
 * - otherwise surrounded by " with embedded " doubled
 *
 * Under `identifierQuoting: 'always'` every name is quoted.
 */

import type { RenderOptions, SqlFragment } from '../types.js';
import { SCHEMA_SEPARATOR } from '../constants.js';
import { formatIdentifier, resolveRenderOptions } from '../utils/escape.js';
import { QuotedDataConcat, compareRaw } from './quoted-data.js';

/**
 * Several strings escaped as one identifier.
 *
 * IdentifierConcat(['foo_', 'bar', '_baz']) renders `foo_bar_baz`
 */
export class IdentifierConcat implements SqlFragment {
  readonly parts: readonly string[];

  constructor(parts: readonly string[]) {
    this.parts = [...parts];
  }

  asString(): string {
    return this.parts.join('');
  }

  asQuotedData(): QuotedDataConcat {
    return new QuotedDataConcat(this.parts);
  }

  render(options?: Partial<RenderOptions>): string {
    return formatIdentifier(this.asString(), resolveRenderOptions(options).identifierQuoting);
  }

  toString(): string {
    return this.render();
  }
}

/**
 * Generic SQL name (table, schema, column etc.)
 *
 * Keywords are plain identifiers too, so `new Table('order')` renders
 * `order`; pass `{ identifierQuoting: 'always' }` to get `"order"`.
 */
export class Identifier implements SqlFragment {
  constructor(readonly value: string) {}

  /**
   * Gets the raw, unescaped value
   */
  asString(): string {
    return this.value;
  }

  /**
   * Gets the name as a string literal, e.g. for information_schema lookups
   */
  asQuotedData(): QuotedDataConcat {
    return new QuotedDataConcat([this.value]);
  }

  equals(other: Identifier): boolean {
    return this.value === other.value;
  }

  compare(other: Identifier): number {
    return compareRaw(this.value, other.value);
  }

  render(options?: Partial<RenderOptions>): string {
    return formatIdentifier(this.value, resolveRenderOptions(options).identifierQuoting);
  }

  toString(): string {
    return this.render();
  }
}

type IdentifierSource = string | Identifier;

function rawName(source: IdentifierSource): string {
  return typeof source === 'string' ? source : source.value;
}

/**
 * Database schema name
 */
export class Schema extends Identifier {
  readonly kind = 'schema' as const;

  constructor(name: IdentifierSource) {
    super(rawName(name));
  }
}

/**
 * Table column name
 */
export class Column extends Identifier {
  readonly kind = 'column' as const;

  constructor(name: IdentifierSource) {
    super(rawName(name));
  }
}

/**
 * Database table name
 */
export class Table extends Identifier {
  readonly kind = 'table' as const;

  constructor(name: IdentifierSource) {
    super(rawName(name));
  }

  /**
   * Qualify this table with a schema
   */
  withSchema(schema: Schema | string): SchemaTable {
    return new SchemaTable(schema, this);
  }

  /**
   * This table name with a postfix, escaped as one identifier.
   * Table('baz').withPostfix('_tmp') renders `baz_tmp`
   */
  withPostfix(postfix: string): IdentifierConcat {
    return new IdentifierConcat([this.value, postfix]);
  }

  /**
   * This table name with a postfix joined by a separator, escaped as one identifier
   */
  withPostfixSep(postfix: string, separator: string): IdentifierConcat {
    return new IdentifierConcat([this.value, separator, postfix]);
  }
}

/**
 * Table name in a schema: `<schema>.<table>`
 *
 * Each half is escaped on its own; the dot is never part of either name.
 */
export class SchemaTable implements SqlFragment {
  readonly kind = 'schema-table' as const;
  private readonly schemaPart: Schema;
  private readonly tablePart: Table;

  constructor(schema: Schema | string, table: Table | string) {
    this.schemaPart = schema instanceof Schema ? schema : new Schema(schema);
    this.tablePart = typeof table === 'string' ? new Table(table) : table;
  }

  /**
   * Build from a [schema, table] pair
   */
  static from([schema, table]: readonly [Schema | string, Table | string]): SchemaTable {
    return new SchemaTable(schema, table);
  }

  /**
   * Gets `Schema` part
   */
  schema(): Schema {
    return this.schemaPart;
  }

  /**
   * Gets `Table` part
   */
  table(): Table {
    return this.tablePart;
  }

  /**
   * Same schema; table name extended with a postfix.
   * SchemaTable('foo', 'baz').withPostfix('_quix') renders `foo.baz_quix`
   */
  withPostfix(postfix: string): SchemaTable {
    return new SchemaTable(this.schemaPart, new Table(this.tablePart.withPostfix(postfix).asString()));
  }

  /**
   * Same schema; table name extended with a separator and a postfix
   */
  withPostfixSep(postfix: string, separator: string): SchemaTable {
    return new SchemaTable(
      this.schemaPart,
      new Table(this.tablePart.withPostfixSep(postfix, separator).asString()),
    );
  }

  /**
   * Gets `schema.table` (raw, unescaped parts) as a string literal
   */
  asQuotedData(): QuotedDataConcat {
    return new QuotedDataConcat([this.schemaPart.value, SCHEMA_SEPARATOR, this.tablePart.value]);
  }

  equals(other: SchemaTable): boolean {
    return this.schemaPart.value === other.schemaPart.value
      && this.tablePart.value === other.tablePart.value;
  }

  render(options?: Partial<RenderOptions>): string {
    const resolved = resolveRenderOptions(options);
    return `${this.schemaPart.render(resolved)}${SCHEMA_SEPARATOR}${this.tablePart.render(resolved)}`;
  }

  toString(): string {
    return this.render();
  }
}
