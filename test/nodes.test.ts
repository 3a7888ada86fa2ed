// test/nodes.test.ts
import { describe, it, expect } from 'vitest';
import { Query, isBinaryOp, isFieldQuery, isPhrase, isUnaryOp } from '../src/query/types.ts';
import { QueryBuilder as q } from '../src/query/builder.ts';
import { isQuery, isValue, isWildcardText } from '../src/query/nodes.ts';
import { queryEquals } from '../src/query/equals.ts';
import { InvalidExpressionError } from '../src/errors/errors.ts';
import { thrown } from './helpers.ts';

describe('node constructors', () => {
  it('builds the same nodes through Query.* and the builder', () => {
    expect(queryEquals(Query.FieldValue(null, 'abc'), q.value('abc'))).toBe(true);
    expect(queryEquals(Query.FieldRange('depth', 1, 2, true), q.range(1, 2, { name: 'depth', isExclusive: true }))).toBe(
      true,
    );
    expect(queryEquals(Query.UnaryOp('-', q.value('a')), q.exclude(q.value('a')))).toBe(true);
  });

  it('applies builder defaults', () => {
    expect(q.value('abc')).toEqual({ type: 'FieldValue', name: null, value: 'abc' });
    expect(q.range(1, 10)).toEqual({ type: 'FieldRange', name: null, start: 1, end: 10, isExclusive: false });
    expect(q.phrase()).toEqual({ type: 'Phrase', terms: [] });
  });

  it('freezes nodes', () => {
    const node = q.and(q.value('a'), q.phrase(q.value('b')));
    expect(Object.isFrozen(node)).toBe(true);
    expect(Object.isFrozen(node.right)).toBe(true);
    if (node.right.type !== 'Phrase') throw new Error('expected a phrase');
    expect(Object.isFrozen(node.right.terms)).toBe(true);
  });

  it('copies phrase terms', () => {
    const terms = [q.value('a')];
    const phrase = Query.Phrase(terms);
    terms.push(q.value('b'));
    expect(phrase.terms).toHaveLength(1);
  });

  it('rejects a range without bounds', () => {
    const e = thrown(() => q.range(null, null));
    expect(e).toBeInstanceOf(InvalidExpressionError);
    expect(e).toMatchObject({
      code: 'E_QUERY_INVALID_EXPRESSION',
      nodeType: 'FieldRange',
      message: 'Invalid FieldRange: at least one of start and end must be given',
    });
  });

  it('rejects wildcard text without a wildcard or with whitespace', () => {
    expect(thrown(() => q.wildcard('hello world'))).toBeInstanceOf(InvalidExpressionError);
    expect(thrown(() => q.wildcard('hello* world'))).toBeInstanceOf(InvalidExpressionError);
    expect(thrown(() => q.wildcard('x'))).toBeInstanceOf(InvalidExpressionError);
    expect(thrown(() => q.wildcard('x\\*'))).toBeInstanceOf(InvalidExpressionError);
  });

  it('rejects non-finite numbers', () => {
    expect(thrown(() => q.value(Number.NaN))).toMatchObject({
      message: 'Invalid FieldValue: unsupported value NaN (expected text, finite number, boolean or null)',
    });
    expect(thrown(() => q.range(0, Number.POSITIVE_INFINITY))).toBeInstanceOf(InvalidExpressionError);
  });

  it('rejects malformed and reserved field names', () => {
    expect(thrown(() => q.value('x', '1abc'))).toBeInstanceOf(InvalidExpressionError);
    expect(thrown(() => q.value('x', 'has space'))).toBeInstanceOf(InvalidExpressionError);
    expect(thrown(() => q.value('x', 'AND'))).toMatchObject({
      message: 'Invalid FieldValue: field name "AND" is a reserved word',
    });
    expect(q.value('x', 'meta.collector-id').name).toBe('meta.collector-id');
  });
});

describe('isWildcardText', () => {
  it('needs an unescaped * or ?', () => {
    expect(isWildcardText('a*b')).toBe(true);
    expect(isWildcardText('a?')).toBe(true);
    expect(isWildcardText('a\\*b')).toBe(false);
    expect(isWildcardText('a\\*b*')).toBe(true);
    expect(isWildcardText('abc')).toBe(false);
  });

  it('rejects unescaped whitespace', () => {
    expect(isWildcardText('a b')).toBe(false);
    expect(isWildcardText('a* b')).toBe(false);
    expect(isWildcardText('a\\ b*')).toBe(true);
  });

  it('is false for non-text values', () => {
    expect(isWildcardText(1)).toBe(false);
    expect(isWildcardText(null)).toBe(false);
    expect(isWildcardText(true)).toBe(false);
  });
});

describe('guards', () => {
  it('recognizes query nodes and values', () => {
    expect(isQuery(q.value('a'))).toBe(true);
    expect(isQuery({ type: 'Other' })).toBe(false);
    expect(isQuery(null)).toBe(false);
    expect(isValue('a')).toBe(true);
    expect(isValue(null)).toBe(true);
    expect(isValue(Number.NaN)).toBe(false);
    expect(isValue({})).toBe(false);
  });

  it('narrows by variant', () => {
    const nodes = [q.phrase(), q.or(q.value('a'), q.value('b')), q.include(q.value('a')), q.range(1, 2), q.wildcard('a*')];
    expect(nodes.map(isPhrase)).toEqual([true, false, false, false, false]);
    expect(nodes.map(isBinaryOp)).toEqual([false, true, false, false, false]);
    expect(nodes.map(isUnaryOp)).toEqual([false, false, true, false, false]);
    expect(nodes.map(isFieldQuery)).toEqual([false, false, false, true, true]);
  });
});
