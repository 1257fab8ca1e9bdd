/**
 * String literal fragments
 * Rendered in single quotes with embedded single quotes doubled.
 */

import type { SqlFragment } from '../types.js';
import { quoteLiteral } from '../utils/escape.js';

/**
 * Several strings escaped as one literal.
 *
 * QuotedDataConcat(['foo', '.', "b'ar"]) renders `'foo.b''ar'`
 */
export class QuotedDataConcat implements SqlFragment {
  readonly parts: readonly string[];

  constructor(parts: readonly string[]) {
    this.parts = [...parts];
  }

  /**
   * Concatenated raw value
   */
  asString(): string {
    return this.parts.join('');
  }

  render(): string {
    return quoteLiteral(this.asString());
  }

  toString(): string {
    return this.render();
  }
}

/**
 * Literal whose content is transformed when rendered
 */
export class MappedQuotedData implements SqlFragment {
  constructor(
    readonly value: string,
    private readonly mapper: (value: string) => string,
  ) {}

  render(): string {
    return quoteLiteral(this.mapper(this.value));
  }

  toString(): string {
    return this.render();
  }
}

/**
 * Strings and other data in single quotes.
 * Always a quoted string literal, never a bare number or NULL.
 */
export class QuotedData implements SqlFragment {
  constructor(readonly value: string) {}

  /**
   * Gets the raw, unescaped value
   */
  asString(): string {
    return this.value;
  }

  /**
   * Transform the raw value at render time, e.g. `data.map(v => v.toUpperCase())`
   */
  map(mapper: (value: string) => string): MappedQuotedData {
    return new MappedQuotedData(this.value, mapper);
  }

  equals(other: QuotedData): boolean {
    return this.value === other.value;
  }

  compare(other: QuotedData): number {
    return compareRaw(this.value, other.value);
  }

  render(): string {
    return quoteLiteral(this.value);
  }

  toString(): string {
    return this.render();
  }
}

/**
 * Code-unit ordering of raw values, usable as an Array.prototype.sort comparator
 */
export function compareRaw(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
