// src/adapters/sqlite/index.ts

// 目的: クエリ木を SQLite の SELECT 文（プレースホルダ付き）に変換する。
//
// - 1テーブル・平坦な列を前提とする。ドット区切りのフィールド名はそのまま列名として扱う。
// - 値はすべて ? で束縛し、識別子はダブルクオートで囲む。
// - テキスト比較は LOWER / LIKE を使うため大文字小文字を区別しない（LIKE の無視は ASCII のみ）。
// - 各ノードは {sql, params} の断片を返す。Phrase で項の並びを組み替えても
//   プレースホルダと params の対応が崩れないようにするため。

import type {
  PhraseQuery,
  BinaryOpQuery,
  UnaryOpQuery,
  FieldValueQuery,
  FieldRangeQuery,
  FieldWildcardQuery,
  Query,
  Value,
} from '../../query/types.ts';
import type { QueryVisitor } from '../../query/visitor.ts';
import { accept } from '../../query/visitor.ts';
import { collectFieldNames } from '../../query/analysis.ts';
import { ESCAPE_CHAR, KW_AND, KW_NOT, OP_EXCLUDE } from '../../query/syntax.ts';
import { FieldQueryError } from '../../errors/errors.ts';
import { failAdapter, failUnsupportedFeature } from '../adapterErrors.ts';

const TARGET = 'sqlite';

export type SqlParam = string | number | null;

export type SqliteRow = Record<string, unknown>;

// 実行側の抽象。better-sqlite3 向けの実装は client.ts
export interface SqliteClient {
  query(sql: string, params: SqlParam[]): Promise<SqliteRow[]>;
}

export type SqlOptions = {
  table: string;
  // 参照を許す列。未指定なら列名を検査しない
  columns?: readonly string[];
  // フィールド名なしの述語を展開する列
  defaultColumns?: readonly string[];
};

export type SqlStatement = {
  sql: string;
  params: SqlParam[];
};

type Fragment = SqlStatement;

export function queryToSql(query: Query, options: SqlOptions): SqlStatement {
  const { columns } = options;
  if (columns) {
    for (const name of collectFieldNames(query)) {
      if (!columns.includes(name)) failUnsupportedFeature(TARGET, 'column', `unknown column '${name}'`);
    }
  }
  const where = accept(query, new SqlEmitter(options.defaultColumns ?? []));
  return {
    sql: `SELECT * FROM ${quoteIdent(options.table)} WHERE ${where.sql};`,
    params: where.params,
  };
}

export async function selectMatching(client: SqliteClient, query: Query, options: SqlOptions): Promise<SqliteRow[]> {
  const { sql, params } = queryToSql(query, options);
  try {
    return await client.query(sql, params);
  } catch (e) {
    if (e instanceof FieldQueryError) throw e;
    return failAdapter(`Query failed: ${e instanceof Error ? e.message : String(e)}`, TARGET);
  }
}

class SqlEmitter implements QueryVisitor<Fragment> {
  constructor(private readonly defaultColumns: readonly string[]) {}

  visitPhrase(node: PhraseQuery, terms: Fragment[]): Fragment {
    const required: Fragment[] = [];
    const optional: Fragment[] = [];
    node.terms.forEach((term, i) => {
      const frag = terms[i];
      if (frag === undefined) return;
      // +x / -x は必須項（-x はすでに NOT 済み）
      if (term.type === 'UnaryOp' && term.operator !== KW_NOT) required.push(frag);
      else optional.push(frag);
    });
    const parts = [...required];
    if (optional.length > 0) parts.push(join(optional, 'OR'));
    if (parts.length === 0) return { sql: '1 = 1', params: [] };
    return join(parts, 'AND');
  }

  visitBinaryOp(node: BinaryOpQuery, left: Fragment, right: Fragment): Fragment {
    return join([left, right], node.operator === KW_AND ? 'AND' : 'OR');
  }

  visitUnaryOp(node: UnaryOpQuery, operand: Fragment): Fragment {
    if (node.operator === KW_NOT || node.operator === OP_EXCLUDE) {
      // NULL 列との比較は NULL になり NOT しても NULL のままなので、偽として扱ってから否定する
      return { sql: `(NOT COALESCE(${operand.sql}, 0))`, params: operand.params };
    }
    return operand;
  }

  visitFieldValue(node: FieldValueQuery): Fragment {
    const { value } = node;
    return this.overColumns(node.name, (col) => {
      if (value === null) return { sql: `${col} IS NULL`, params: [] };
      if (typeof value !== 'string') return { sql: `${col} = ?`, params: [bind(value)] };
      // 名前付きは一致、名前なしは部分一致。大文字小文字は常に無視する
      // （メモリ上の評価器では ignoreCase: true に相当）
      if (node.name !== null) return { sql: `LOWER(${col}) = LOWER(?)`, params: [value] };
      return { sql: `LOWER(${col}) LIKE LOWER(?) ESCAPE '\\'`, params: [`%${escapeLike(value)}%`] };
    });
  }

  visitFieldRange(node: FieldRangeQuery): Fragment {
    const lower = node.isExclusive ? '>' : '>=';
    const upper = node.isExclusive ? '<' : '<=';
    return this.overColumns(node.name, (col) => {
      const parts: Fragment[] = [];
      if (node.start !== null) parts.push({ sql: `${col} ${lower} ?`, params: [bind(node.start)] });
      if (node.end !== null) parts.push({ sql: `${col} ${upper} ?`, params: [bind(node.end)] });
      return join(parts, 'AND');
    });
  }

  visitFieldWildcard(node: FieldWildcardQuery): Fragment {
    const pattern = wildcardToLike(node.value);
    return this.overColumns(node.name, (col) => ({ sql: `${col} LIKE ? ESCAPE '\\'`, params: [pattern] }));
  }

  // 名前付きならその列、名前なしなら既定列それぞれに展開して OR でまとめる
  private overColumns(name: string | null, emit: (col: string) => Fragment): Fragment {
    if (name !== null) return emit(quoteIdent(name));
    if (this.defaultColumns.length === 0) {
      failUnsupportedFeature(TARGET, 'defaultColumns', 'unnamed predicates need at least one default column');
    }
    return join(
      this.defaultColumns.map((c) => emit(quoteIdent(c))),
      'OR',
    );
  }
}

function join(parts: Fragment[], op: 'AND' | 'OR'): Fragment {
  const [only] = parts;
  if (parts.length === 1 && only !== undefined) return only;
  return {
    sql: `(${parts.map((p) => p.sql).join(` ${op} `)})`,
    params: parts.flatMap((p) => p.params),
  };
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

// SQLite に真偽値型はないため 1/0 で束縛する
function bind(value: Exclude<Value, null>): SqlParam {
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
}

function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, '\\$&');
}

// * → %、? → _。エスケープされた文字とリテラルの % _ は LIKE 用にエスケープ
export function wildcardToLike(pattern: string): string {
  let out = '';
  let escape = false;
  for (const c of pattern) {
    if (escape) {
      out += escapeLike(c);
      escape = false;
    } else if (c === ESCAPE_CHAR) {
      escape = true;
    } else if (c === '*') {
      out += '%';
    } else if (c === '?') {
      out += '_';
    } else {
      out += escapeLike(c);
    }
  }
  return out;
}
