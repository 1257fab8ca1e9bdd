/**
 * Boolean predicate collections and the statements built from them
 */

import type { RenderOptions, SqlFragment, SqlText } from '../types.js';
import { PREDICATE_SEPARATOR } from '../constants.js';
import { resolveRenderOptions } from '../utils/escape.js';

function renderText(text: SqlText, options: RenderOptions): string {
  return typeof text === 'string' ? text : text.render(options);
}

/**
 * SQL statement keyword followed by predicates joined with AND.
 * Renders nothing when there are no predicates.
 */
export class PredicateStatement implements SqlFragment {
  constructor(
    readonly statement: string,
    private readonly predicates: readonly SqlText[],
  ) {}

  render(options?: Partial<RenderOptions>): string {
    if (this.predicates.length === 0) {
      return '';
    }
    const resolved = resolveRenderOptions(options);
    const joined = this.predicates.map(p => renderText(p, resolved)).join(PREDICATE_SEPARATOR);
    return `${this.statement} ${joined}`;
  }

  toString(): string {
    return this.render();
  }
}

/**
 * Collection of boolean predicates
 *
 * @example
 * Predicates.from(sql`${new Column('id')} = ${new QuotedData('42')}`)
 *   .and('deleted_at IS NULL')
 *   .asWhere()
 *   .toString();
 * // WHERE id = '42'
 * // AND deleted_at IS NULL
 */
export class Predicates implements Iterable<SqlText> {
  private readonly items: SqlText[] = [];

  /**
   * Creates collection containing given predicate
   */
  static from(predicate: SqlText): Predicates {
    return new Predicates().and(predicate);
  }

  /**
   * Creates collection containing given predicates
   */
  static fromAll(predicates: Iterable<SqlText>): Predicates {
    return new Predicates().andAll(predicates);
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Gets WHERE statement with predicates.
   * The statement sees predicates appended later.
   */
  asWhere(): PredicateStatement {
    return new PredicateStatement('WHERE', this.items);
  }

  /**
   * Appends predicate
   */
  andPush(predicate: SqlText): void {
    this.items.push(predicate);
  }

  /**
   * Appends all predicates
   */
  andExtend(predicates: Iterable<SqlText>): void {
    // Snapshot first: the source may be this collection
    this.items.push(...Array.from(predicates));
  }

  /**
   * Appends predicate with fluent API
   */
  and(predicate: SqlText): this {
    this.andPush(predicate);
    return this;
  }

  /**
   * Appends all predicates with fluent API
   */
  andAll(predicates: Iterable<SqlText>): this {
    this.andExtend(predicates);
    return this;
  }

  [Symbol.iterator](): Iterator<SqlText> {
    return this.items[Symbol.iterator]();
  }
}
