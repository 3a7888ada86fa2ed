// src/query/types.ts
// クエリ木の型定義。variant は閉じた集合で、利用側はすべて `type` で網羅的に分岐する。
// 本ファイルを変更したら render / equals / repr / visitor の switch も同期すること。

import { QueryConstructors } from './nodes.ts';

export type Value = string | number | boolean | null;

export type BinaryOperator = 'AND' | 'OR';
export type UnaryOperator = 'NOT' | '+' | '-';

export type Query =
  | PhraseQuery
  | BinaryOpQuery
  | UnaryOpQuery
  | FieldValueQuery
  | FieldWildcardQuery
  | FieldRangeQuery;

export type QueryType = Query['type'];

// 型 Query と同名のコンパニオン。Query.FieldValue(null, "abc") のように生成する
export const Query = QueryConstructors;

// 並置された部分式（"a b c"）
export interface PhraseQuery {
  readonly type: 'Phrase';
  readonly terms: readonly Query[];
}

// A AND B, A OR B
export interface BinaryOpQuery {
  readonly type: 'BinaryOp';
  readonly operator: BinaryOperator;
  readonly left: Query;
  readonly right: Query;
}

// NOT A, +A, -A
export interface UnaryOpQuery {
  readonly type: 'UnaryOp';
  readonly operator: UnaryOperator;
  readonly operand: Query;
}

// name:value（name が null なら値のみ）
export interface FieldValueQuery {
  readonly type: 'FieldValue';
  readonly name: string | null;
  readonly value: Value;
}

// name:pa*tt?rn
export interface FieldWildcardQuery {
  readonly type: 'FieldWildcard';
  readonly name: string | null;
  readonly value: string;
}

// name:[start TO end] / name:{start TO end}
export interface FieldRangeQuery {
  readonly type: 'FieldRange';
  readonly name: string | null;
  readonly start: Value;
  readonly end: Value;
  readonly isExclusive: boolean;
}

export type FieldQuery = FieldValueQuery | FieldWildcardQuery | FieldRangeQuery;

export function isPhrase(node: Query): node is PhraseQuery {
  return node.type === 'Phrase';
}
export function isBinaryOp(node: Query): node is BinaryOpQuery {
  return node.type === 'BinaryOp';
}
export function isUnaryOp(node: Query): node is UnaryOpQuery {
  return node.type === 'UnaryOp';
}
export function isFieldQuery(node: Query): node is FieldQuery {
  return node.type === 'FieldValue' || node.type === 'FieldWildcard' || node.type === 'FieldRange';
}

// 網羅性チェック用。新しい variant を足したときにコンパイルエラーで気づける
export function assertNever(node: never): never {
  throw new Error(`Unexpected query node: ${JSON.stringify(node)}`);
}
