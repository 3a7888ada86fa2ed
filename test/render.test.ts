// test/render.test.ts
import { describe, it, expect } from 'vitest';
import { QueryBuilder as q } from '../src/query/builder.ts';
import { toQueryString, needsQuoting, precedenceOf, PRECEDENCE } from '../src/query/render.ts';
import { toRepr } from '../src/query/repr.ts';
import { queryEquals } from '../src/query/equals.ts';

const a = q.value('a');
const b = q.value('b');
const c = q.value('c');

describe('toQueryString', () => {
  it('parenthesizes only lower-precedence operands', () => {
    expect(toQueryString(q.and(a, q.or(b, c)))).toBe('a AND (b OR c)');
    expect(toQueryString(q.or(a, q.and(b, c)))).toBe('a OR b AND c');
    expect(toQueryString(q.or(q.or(a, b), c))).toBe('a OR b OR c');
    expect(toQueryString(q.not(q.and(a, b)))).toBe('NOT (a AND b)');
    expect(toQueryString(q.not(q.not(a)))).toBe('NOT NOT a');
    expect(toQueryString(q.and(q.phrase(a, b), c))).toBe('(a b) AND c');
  });

  it('writes +/- without a space and NOT with one', () => {
    expect(toQueryString(q.include(a))).toBe('+a');
    expect(toQueryString(q.exclude(q.or(a, b)))).toBe('-(a OR b)');
    expect(toQueryString(q.not(a))).toBe('NOT a');
  });

  it('joins phrase terms with spaces and wraps nested phrases', () => {
    expect(toQueryString(q.phrase(a, q.include(b), q.exclude(c)))).toBe('a +b -c');
    expect(toQueryString(q.phrase(a, q.phrase(b, c)))).toBe('a (b c)');
    expect(toQueryString(q.phrase())).toBe('');
  });

  it('quotes text only when needed', () => {
    expect(toQueryString(q.value('a b'))).toBe('"a b"');
    expect(toQueryString(q.value('abc'))).toBe('abc');
    expect(toQueryString(q.value(''))).toBe('""');
    expect(toQueryString(q.value('AND'))).toBe('"AND"');
    expect(toQueryString(q.value('42'))).toBe('"42"');
    expect(toQueryString(q.value('say "hi"'))).toBe('"say \\"hi\\""');
    expect(toQueryString(q.value('a\\b'))).toBe('"a\\\\b"');
  });

  it('writes numbers, booleans and None bare', () => {
    expect(toQueryString(q.value(42))).toBe('42');
    expect(toQueryString(q.value(-1.5, 'temp'))).toBe('temp:-1.5');
    expect(toQueryString(q.value(true, 'verified'))).toBe('verified:true');
    expect(toQueryString(q.value(null, 'depth'))).toBe('depth:None');
  });

  it('writes ranges', () => {
    expect(toQueryString(q.range(1, 10))).toBe('[1 TO 10]');
    expect(toQueryString(q.range(1, 10, { isExclusive: true }))).toBe('{1 TO 10}');
    expect(toQueryString(q.range(null, 10, { name: 'depth' }))).toBe('depth:[None TO 10]');
    expect(toQueryString(q.range('a', 'm z', { name: 'title' }))).toBe('title:[a TO "m z"]');
  });

  it('never quotes wildcards', () => {
    expect(toQueryString(q.wildcard('ridge*', 'title'))).toBe('title:ridge*');
    expect(toQueryString(q.wildcard('a\\ b?'))).toBe('a\\ b?');
  });
});

describe('needsQuoting', () => {
  it('flags reserved characters, words and number-like text', () => {
    expect(needsQuoting('plain')).toBe(false);
    expect(needsQuoting('a:b')).toBe(true);
    expect(needsQuoting('tab\there')).toBe(true);
    expect(needsQuoting('true')).toBe(true);
    expect(needsQuoting('None')).toBe(true);
    expect(needsQuoting('1e5')).toBe(true);
    expect(needsQuoting('1e5x')).toBe(false);
  });
});

describe('precedenceOf', () => {
  it('orders phrase < OR < AND < NOT < sign < field', () => {
    expect(precedenceOf(q.phrase())).toBe(PRECEDENCE.Phrase);
    expect(precedenceOf(q.or(a, b))).toBeLessThan(precedenceOf(q.and(a, b)));
    expect(precedenceOf(q.and(a, b))).toBeLessThan(precedenceOf(q.not(a)));
    expect(precedenceOf(q.not(a))).toBeLessThan(precedenceOf(q.include(a)));
    expect(precedenceOf(q.exclude(a))).toBeLessThan(precedenceOf(a));
  });
});

describe('toRepr', () => {
  it('prints constructor calls with text always quoted', () => {
    const query = q.and(q.value('abc'), q.range(null, 10, { name: 'depth', isExclusive: true }));
    expect(toRepr(query)).toBe('BinaryOp("AND", FieldValue(null, "abc"), FieldRange("depth", null, 10, true))');
    expect(toRepr(q.not(q.wildcard('a*')))).toBe('UnaryOp("NOT", FieldWildcard(null, "a*"))');
    expect(toRepr(q.phrase(q.value(true, 'f'), q.range(1, 2)))).toBe(
      'Phrase([FieldValue("f", true), FieldRange(null, 1, 2)])',
    );
  });
});

describe('queryEquals', () => {
  it('compares structure, not identity', () => {
    expect(queryEquals(q.and(q.value('a'), q.value('b')), q.and(q.value('a'), q.value('b')))).toBe(true);
    expect(queryEquals(q.phrase(a), q.phrase(a, b))).toBe(false);
    expect(queryEquals(q.range(1, 2), q.range(1, 2, { isExclusive: true }))).toBe(false);
  });

  it('never equates different variants or names', () => {
    expect(queryEquals(q.value('x*'), q.wildcard('x*'))).toBe(false);
    expect(queryEquals(q.value('x', 'f'), q.value('x'))).toBe(false);
    expect(queryEquals(q.value(1), q.value(true))).toBe(false);
    expect(queryEquals(q.not(a), q.exclude(a))).toBe(false);
  });
});
