import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ColumnType, ColumnSchema } from '../../../fragments/column-schema.js';
import { Column } from '../../../fragments/identifier.js';
import { MonetDbDialect, SqlServerDialect } from '../../../dialects.js';
import { UnsupportedDataTypeError } from '../../../utils/error-handler.js';

describe('Column definitions', () => {
  describe('ColumnType', () => {
    it('should look up the dialect type name', () => {
      assert.strictEqual(`${ColumnType.of(SqlServerDialect, 'string')}`, 'NVARCHAR');
      assert.strictEqual(`${ColumnType.of(MonetDbDialect, 'string')}`, 'STRING');
      assert.strictEqual(ColumnType.of(MonetDbDialect, 'float64').asString(), 'DOUBLE');
    });

    it('should keep its dialect', () => {
      assert.strictEqual(ColumnType.of(MonetDbDialect, 'int32').dialect.name, 'monetdb');
    });

    it('should throw for types the dialect lacks', () => {
      assert.throws(
        () => ColumnType.of(MonetDbDialect, 'float32'),
        (error: unknown) => {
          assert.ok(error instanceof UnsupportedDataTypeError);
          assert.strictEqual(error.dialect, 'monetdb');
          assert.strictEqual(error.scalar, 'float32');
          return true;
        },
      );
    });

    it('should quote custom type names that are not plain', () => {
      assert.strictEqual(`${new ColumnType(SqlServerDialect, 'my type')}`, '"my type"');
      assert.strictEqual(`${new ColumnType(MonetDbDialect, 'a"b')}`, '"a""b"');
    });

    it('should leave parameterised type names bare', () => {
      assert.strictEqual(`${new ColumnType(SqlServerDialect, 'NVARCHAR(255)')}`, 'NVARCHAR(255)');
      assert.strictEqual(new ColumnType(MonetDbDialect, 'DECIMAL(10,2)').render(), 'DECIMAL(10,2)');
    });
  });

  describe('ColumnSchema', () => {
    it('should render name then type', () => {
      const column = new ColumnSchema('display name', ColumnType.of(SqlServerDialect, 'string'));
      assert.strictEqual(`${column}`, '"display name" NVARCHAR');
    });

    it('should build from a scalar kind', () => {
      assert.strictEqual(`${ColumnSchema.of(MonetDbDialect, 'id', 'int64')}`, 'id BIGINT');
      assert.strictEqual(`${ColumnSchema.of(SqlServerDialect, new Column('flag'), 'boolean')}`, 'flag BIT');
    });

    it('should quote the column but not the type in always mode', () => {
      const column = ColumnSchema.of(MonetDbDialect, 'id', 'int64');
      assert.strictEqual(column.render({ identifierQuoting: 'always' }), '"id" BIGINT');
    });

    it('should render a parameterised type after the column', () => {
      const price = new ColumnSchema('price', new ColumnType(SqlServerDialect, 'DECIMAL(10,2)'));
      assert.strictEqual(`${price}`, 'price DECIMAL(10,2)');
      assert.strictEqual(price.render({ identifierQuoting: 'always' }), '"price" DECIMAL(10,2)');
    });

    it('should expose its parts', () => {
      const column = ColumnSchema.of(SqlServerDialect, 'ratio', 'float32');
      assert.strictEqual(column.column().value, 'ratio');
      assert.strictEqual(column.columnType().name, 'REAL');
    });
  });
});
