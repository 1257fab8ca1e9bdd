import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Predicates, PredicateStatement } from '../../../fragments/predicates.js';
import { Column } from '../../../fragments/identifier.js';
import { QuotedData } from '../../../fragments/quoted-data.js';
import { sql } from '../../../fragments/template.js';

describe('Predicates', () => {
  it('should join predicates with AND on new lines', () => {
    const where = Predicates.from("foo = 'bar'")
      .and('baz')
      .andAll(['hello', 'world'])
      .andAll(Predicates.fromAll(['abc', '123']))
      .asWhere()
      .toString();

    assert.strictEqual(where, "WHERE foo = 'bar'\nAND baz\nAND hello\nAND world\nAND abc\nAND 123");
  });

  it('should render a single predicate without AND', () => {
    assert.strictEqual(`${Predicates.from('a = 1').asWhere()}`, 'WHERE a = 1');
  });

  it('should render nothing when empty', () => {
    assert.strictEqual(`${new Predicates().asWhere()}`, '');
  });

  it('should mutate with andPush and andExtend', () => {
    const predicates = new Predicates();
    predicates.andPush('a');
    predicates.andExtend(['b', 'c']);
    assert.strictEqual(predicates.size, 3);
    assert.deepStrictEqual([...predicates], ['a', 'b', 'c']);
  });

  it('should extend from itself without looping', () => {
    const predicates = Predicates.fromAll(['a', 'b']);
    predicates.andExtend(predicates);
    assert.deepStrictEqual([...predicates], ['a', 'b', 'a', 'b']);
  });

  it('should see predicates appended after asWhere', () => {
    const predicates = Predicates.from('a');
    const where = predicates.asWhere();
    predicates.andPush('b');
    assert.strictEqual(where.toString(), 'WHERE a\nAND b');
  });

  it('should render fragment predicates with the statement options', () => {
    const where = Predicates.from(sql`${new Column('id')} = ${new QuotedData("o'k")}`)
      .and(new Column('active'))
      .asWhere();

    assert.strictEqual(where.render(), "WHERE id = 'o''k'\nAND active");
    assert.strictEqual(where.render({ identifierQuoting: 'always' }), `WHERE "id" = 'o''k'\nAND "active"`);
  });

  it('should support other statement keywords', () => {
    assert.strictEqual(new PredicateStatement('HAVING', ['count(*) > 1']).toString(), 'HAVING count(*) > 1');
  });
});
