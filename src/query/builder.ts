// src/query/builder.ts
// 生成関数の薄いファサード。既定値（フィールド名なし、範囲は inclusive）をここで一元管理する。
// 検証は各生成関数に委ねる。状態は持たない。

import type {
  Query,
  Value,
  PhraseQuery,
  BinaryOpQuery,
  UnaryOpQuery,
  FieldValueQuery,
  FieldWildcardQuery,
  FieldRangeQuery,
} from './types.ts';
import { QueryConstructors } from './nodes.ts';
import { KW_AND, KW_NOT, KW_OR, OP_EXCLUDE, OP_INCLUDE } from './syntax.ts';

export type RangeOptions = {
  isExclusive?: boolean;
  name?: string | null;
};

export const QueryBuilder = {
  value(value: Value, name: string | null = null): FieldValueQuery {
    return QueryConstructors.FieldValue(name, value);
  },

  range(start: Value, end: Value, options: RangeOptions = {}): FieldRangeQuery {
    return QueryConstructors.FieldRange(options.name ?? null, start, end, options.isExclusive ?? false);
  },

  wildcard(value: string, name: string | null = null): FieldWildcardQuery {
    return QueryConstructors.FieldWildcard(name, value);
  },

  include(query: Query): UnaryOpQuery {
    return QueryConstructors.UnaryOp(OP_INCLUDE, query);
  },

  exclude(query: Query): UnaryOpQuery {
    return QueryConstructors.UnaryOp(OP_EXCLUDE, query);
  },

  phrase(...terms: Query[]): PhraseQuery {
    return QueryConstructors.Phrase(terms);
  },

  not(query: Query): UnaryOpQuery {
    return QueryConstructors.UnaryOp(KW_NOT, query);
  },

  and(left: Query, right: Query): BinaryOpQuery {
    return QueryConstructors.BinaryOp(KW_AND, left, right);
  },

  or(left: Query, right: Query): BinaryOpQuery {
    return QueryConstructors.BinaryOp(KW_OR, left, right);
  },
};
