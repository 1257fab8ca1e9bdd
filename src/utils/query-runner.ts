/**
 * Executes rendered fragments through knex
 */

import type { Knex } from 'knex';
import type { RenderOptions, SqlText } from '../types.js';
import { debugLogQuery } from './debug-logger.js';
import { handleQueryError } from './error-handler.js';

export type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Render a query to text
 */
export function renderQuery(query: SqlText, options?: Partial<RenderOptions>): string {
  return typeof query === 'string' ? query : query.render(options);
}

/**
 * Render and execute a query with knex.raw.
 * Failures are logged with the rendered SQL and rethrown unchanged.
 *
 * The rendered text is passed without bindings. SQLite and MySQL clients
 * send it unchanged; the pg client still rewrites every `?` to `$n`.
 *
 * @returns Driver result as knex returns it for raw queries
 */
export async function runQuery(
  db: Knex,
  query: SqlText,
  context: string,
  options?: Partial<RenderOptions>
): Promise<unknown> {
  const sql = renderQuery(query, options);
  const started = Date.now();

  try {
    const result: unknown = await db.raw(sql);
    debugLogQuery(context, sql, Date.now() - started);
    return result;
  } catch (error) {
    handleQueryError(context, error, sql);
    throw error;
  }
}

/**
 * Normalize a raw result to its rows.
 * SQLite drivers return the rows, PostgreSQL `{ rows }`, MySQL `[rows, fields]`.
 */
export function extractRows(result: unknown): Row[] {
  let rows: unknown = result;

  if (isRow(result) && Array.isArray(result.rows)) {
    rows = result.rows;
  } else if (Array.isArray(result) && result.length === 2 && Array.isArray(result[0]) && Array.isArray(result[1])) {
    rows = result[0];
  }

  if (!Array.isArray(rows)) {
    return [];
  }
  return rows.filter(isRow);
}

/**
 * Execute a query and return its rows
 */
export async function queryRows(
  db: Knex,
  query: SqlText,
  context: string,
  options?: Partial<RenderOptions>
): Promise<Row[]> {
  return extractRows(await runQuery(db, query, context, options));
}
