// src/query/equals.ts
import type { Query } from './types.ts';
import { assertNever } from './types.ts';

/**
 * 構造的等価性。variant が異なれば内容が重なっていても等しくない
 * （FieldValue "a*" と FieldWildcard "a*" は別物）。
 * スカラーは === で比較するため true と 1 も等しくない。
 */
export function queryEquals(a: Query, b: Query): boolean {
  if (a === b) return true;
  switch (a.type) {
    case 'Phrase':
      return (
        b.type === 'Phrase' &&
        a.terms.length === b.terms.length &&
        a.terms.every((term, i) => {
          const other = b.terms[i];
          return other !== undefined && queryEquals(term, other);
        })
      );
    case 'BinaryOp':
      return (
        b.type === 'BinaryOp' &&
        a.operator === b.operator &&
        queryEquals(a.left, b.left) &&
        queryEquals(a.right, b.right)
      );
    case 'UnaryOp':
      return b.type === 'UnaryOp' && a.operator === b.operator && queryEquals(a.operand, b.operand);
    case 'FieldValue':
      return b.type === 'FieldValue' && a.name === b.name && a.value === b.value;
    case 'FieldWildcard':
      return b.type === 'FieldWildcard' && a.name === b.name && a.value === b.value;
    case 'FieldRange':
      return (
        b.type === 'FieldRange' &&
        a.name === b.name &&
        a.start === b.start &&
        a.end === b.end &&
        a.isExclusive === b.isExclusive
      );
    default:
      return assertNever(a);
  }
}
