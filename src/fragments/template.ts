/**
 * `sql` tagged template
 *
 * Only fragments may be interpolated, so every dynamic name or value has
 * gone through an escaping routine:
 *
 *   sql`SELECT ${new Column('foo bar')} FROM ${new Table('t')}`
 *     .toString(); // SELECT "foo bar" FROM t
 *
 * Plain strings are a compile error; wrap them in QuotedData or an
 * identifier type first.
 */

import type { RenderOptions, SqlFragment } from '../types.js';
import { resolveRenderOptions } from '../utils/escape.js';

export class SqlTemplate implements SqlFragment {
  constructor(
    private readonly strings: readonly string[],
    private readonly values: readonly SqlFragment[],
  ) {}

  /**
   * Renders every interpolated fragment with the same options,
   * including nested templates
   */
  render(options?: Partial<RenderOptions>): string {
    const resolved = resolveRenderOptions(options);
    let out = this.strings[0] ?? '';
    this.values.forEach((value, i) => {
      out += value.render(resolved) + (this.strings[i + 1] ?? '');
    });
    return out;
  }

  toString(): string {
    return this.render();
  }
}

export function sql(strings: TemplateStringsArray, ...values: SqlFragment[]): SqlTemplate {
  return new SqlTemplate([...strings], values);
}
