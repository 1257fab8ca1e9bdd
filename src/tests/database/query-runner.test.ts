/**
 * Query Runner Test
 * Executes rendered fragments against in-memory SQLite through knex
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import type { Knex } from 'knex';
import { connectDb, disconnectDb } from '../utils/test-helpers.js';
import { runQuery, queryRows, renderQuery, extractRows } from '../../utils/query-runner.js';
import { initDebugLogger, closeDebugLogger } from '../../utils/debug-logger.js';
import { Column, Table } from '../../fragments/identifier.js';
import { QuotedData } from '../../fragments/quoted-data.js';
import { ColumnSchema } from '../../fragments/column-schema.js';
import { Predicates } from '../../fragments/predicates.js';
import { sql } from '../../fragments/template.js';
import { SqlServerDialect } from '../../dialects.js';

describe('Query Runner', () => {
  let db: Knex;
  let logDir: string;
  const users = new Table('app users');

  before(async () => {
    db = await connectDb();
    logDir = mkdtempSync(join(tmpdir(), 'sqlfrag-runner-'));

    await runQuery(
      db,
      sql`CREATE TABLE ${users} (${ColumnSchema.of(SqlServerDialect, 'id', 'int64')}, ${ColumnSchema.of(SqlServerDialect, 'display name', 'string')})`,
      'create-users',
    );
  });

  after(async () => {
    await closeDebugLogger();
    await disconnectDb(db);
    rmSync(logDir, { recursive: true, force: true });
  });

  describe('renderQuery', () => {
    it('should pass strings through and render fragments', () => {
      assert.strictEqual(renderQuery('SELECT 1'), 'SELECT 1');
      assert.strictEqual(renderQuery(sql`SELECT * FROM ${users}`), 'SELECT * FROM "app users"');
      assert.strictEqual(renderQuery(sql`SELECT ${new Column('id')}`, { identifierQuoting: 'always' }), 'SELECT "id"');
    });
  });

  describe('runQuery / queryRows', () => {
    it('should insert and select through fragments', async () => {
      await runQuery(
        db,
        sql`INSERT INTO ${users} (${new Column('id')}, ${new Column('display name')}) VALUES (1, ${new QuotedData("O'Brien")})`,
        'insert-user',
      );

      const where = Predicates.from(sql`${new Column('display name')} = ${new QuotedData("O'Brien")}`).asWhere();
      const rows = await queryRows(db, sql`SELECT ${new Column('id')}, ${new Column('display name')} FROM ${users} ${where}`, 'select-user');

      assert.deepStrictEqual(rows, [{ id: 1, 'display name': "O'Brien" }]);
    });

    it('should apply render options to the whole query', async () => {
      const rows = await queryRows(
        db,
        sql`SELECT ${new Column('id')} FROM ${users}`,
        'select-always',
        { identifierQuoting: 'always' },
      );
      assert.deepStrictEqual(rows, [{ id: 1 }]);
    });

    it('should accept plain SQL text', async () => {
      assert.deepStrictEqual(await queryRows(db, 'SELECT 1 AS one', 'select-plain'), [{ one: 1 }]);
    });

    it('should rethrow driver errors', async () => {
      await assert.rejects(
        runQuery(db, sql`SELECT * FROM ${new Table('missing table')}`, 'select-missing'),
        /no such table: missing table/,
      );
    });
  });

  describe('logging', () => {
    it('should log executed and failed queries', async () => {
      const logPath = join(logDir, 'debug.log');
      initDebugLogger(logPath, 'debug');

      await runQuery(db, 'SELECT 2 AS two', 'logged-select');
      await assert.rejects(runQuery(db, 'SELECT * FROM nowhere', 'logged-failure'));
      await closeDebugLogger();

      const lines = readFileSync(logPath, 'utf-8').trim().split('\n');
      assert.ok(lines.some(line => line.includes('[DEBUG] DB Query [logged-select] | Data: {"sql":"SELECT 2 AS two","duration_ms":')));
      assert.ok(lines.some(line => line.includes('[ERROR] Query logged-failure: ') && line.includes('no such table: nowhere')));
    });
  });

  describe('extractRows', () => {
    it('should unwrap driver result shapes', () => {
      assert.deepStrictEqual(extractRows([{ a: 1 }, { a: 2 }]), [{ a: 1 }, { a: 2 }]);
      assert.deepStrictEqual(extractRows({ rows: [{ a: 1 }] }), [{ a: 1 }]);
      assert.deepStrictEqual(extractRows([[{ a: 1 }], []]), [{ a: 1 }]);
    });

    it('should return no rows for other results', () => {
      assert.deepStrictEqual(extractRows(undefined), []);
      assert.deepStrictEqual(extractRows({ changes: 1 }), []);
    });
  });
});
