// src/query/visitor.ts
// ダブルディスパッチの Visitor。
// 再帰は木の側（accept）が行い、子を左から順に評価した結果を親の visit に渡す（後行順）。
// Visitor は6つすべての variant を実装する必要がある（既定の実装は用意しない）。
// 結果を返さないノードがある場合は T に undefined を含める（例: QueryVisitor<string | undefined>）。

import type {
  Query,
  PhraseQuery,
  BinaryOpQuery,
  UnaryOpQuery,
  FieldValueQuery,
  FieldRangeQuery,
  FieldWildcardQuery,
} from './types.ts';
import { assertNever } from './types.ts';

export interface QueryVisitor<T> {
  /** @param terms 各項を訪問した結果（項の順） */
  visitPhrase(node: PhraseQuery, terms: T[]): T;
  /** @param left 左辺の結果 @param right 右辺の結果 */
  visitBinaryOp(node: BinaryOpQuery, left: T, right: T): T;
  /** @param operand 被演算子の結果 */
  visitUnaryOp(node: UnaryOpQuery, operand: T): T;
  visitFieldValue(node: FieldValueQuery): T;
  visitFieldRange(node: FieldRangeQuery): T;
  visitFieldWildcard(node: FieldWildcardQuery): T;
}

export function accept<T>(query: Query, visitor: QueryVisitor<T>): T {
  switch (query.type) {
    case 'Phrase':
      return visitor.visitPhrase(
        query,
        query.terms.map((term) => accept(term, visitor)),
      );
    case 'BinaryOp': {
      // 評価順を固定するため左右を個別に取ってから渡す
      const left = accept(query.left, visitor);
      const right = accept(query.right, visitor);
      return visitor.visitBinaryOp(query, left, right);
    }
    case 'UnaryOp':
      return visitor.visitUnaryOp(query, accept(query.operand, visitor));
    case 'FieldValue':
      return visitor.visitFieldValue(query);
    case 'FieldRange':
      return visitor.visitFieldRange(query);
    case 'FieldWildcard':
      return visitor.visitFieldWildcard(query);
    default:
      return assertNever(query);
  }
}
