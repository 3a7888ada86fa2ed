// src/evaluator/evaluator.ts
// クエリ木をメモリ上のカタログレコード（プレーンな JSON オブジェクト）に対して評価する。
// QueryVisitor<boolean> の具体実装。木の再帰は accept に任せ、ここでは各ノードの真偽だけを決める。

import type {
  PhraseQuery,
  BinaryOpQuery,
  UnaryOpQuery,
  FieldValueQuery,
  FieldRangeQuery,
  FieldWildcardQuery,
  Query,
  Value,
} from '../query/types.ts';
import type { QueryVisitor } from '../query/visitor.ts';
import { accept } from '../query/visitor.ts';
import { ESCAPE_CHAR, KW_AND, KW_NOT, OP_EXCLUDE } from '../query/syntax.ts';
import { failGenericEval, failTypeMismatch } from './evaluationErrors.ts';

export type CatalogRecord = Readonly<Record<string, unknown>>;

export type EvaluateOptions = {
  ignoreCase?: boolean;
  locale?: string;
  // アクセント除去（diacritics folding）
  // true: NFD + 結合文字除去でアクセント差を吸収（テキスト比較/ワイルドカードのみ）
  foldDiacritics?: boolean;
  // フィールド名なしの値を探すフィールド。未指定ならレコードの全フィールド
  defaultFields?: readonly string[];
};

type Predicate = (record: CatalogRecord) => boolean;

// 内部で使う Required 型を明示化
type InternalOptions = {
  ignoreCase: boolean;
  locale: string | undefined;
  foldDiacritics: boolean;
  defaultFields: readonly string[] | undefined;
};

type RangeOp = 'gt' | 'gte' | 'lt' | 'lte';

export function buildPredicate(query: Query, options: EvaluateOptions = {}): Predicate {
  // デフォルトオプション
  const opts: InternalOptions = {
    ignoreCase: options.ignoreCase ?? false,
    locale: options.locale,
    foldDiacritics: options.foldDiacritics ?? false,
    defaultFields: options.defaultFields,
  };

  return function predicate(record: CatalogRecord): boolean {
    if (!isRecord(record)) failGenericEval('Catalog records must be plain objects.');
    return accept(query, new RecordMatcher(record, opts));
  };
}

export function filterRecords<R extends CatalogRecord>(records: readonly R[], query: Query, options: EvaluateOptions = {}): R[] {
  return records.filter(buildPredicate(query, options));
}

/**
 * 1レコード分の照合器。
 * - 名前付きテキストは一致、名前なしテキストは既定フィールドへの部分一致
 * - 配列フィールドはいずれかの要素が合えば一致
 * - 範囲は number 同士 / string 同士で比較。名前付きスカラーの型違いは E_EVAL_TYPE_MISMATCH
 * - Phrase: + の項はすべて一致、- の項はどれも一致しない、任意項があればどれか1つは一致
 */
class RecordMatcher implements QueryVisitor<boolean> {
  constructor(
    private readonly record: CatalogRecord,
    private readonly opts: InternalOptions,
  ) {}

  visitPhrase(node: PhraseQuery, terms: boolean[]): boolean {
    let hasOptional = false;
    let optionalMatched = false;
    for (const [i, term] of node.terms.entries()) {
      const matched = terms[i] ?? false;
      if (term.type === 'UnaryOp' && term.operator !== KW_NOT) {
        // +/- はすでに visitUnaryOp で向きが揃っている（-x は !x）
        if (!matched) return false;
      } else {
        hasOptional = true;
        optionalMatched ||= matched;
      }
    }
    return !hasOptional || optionalMatched;
  }

  visitBinaryOp(node: BinaryOpQuery, left: boolean, right: boolean): boolean {
    return node.operator === KW_AND ? left && right : left || right;
  }

  visitUnaryOp(node: UnaryOpQuery, operand: boolean): boolean {
    if (node.operator === KW_NOT || node.operator === OP_EXCLUDE) return !operand;
    return operand;
  }

  visitFieldValue(node: FieldValueQuery): boolean {
    const { name, value } = node;
    if (value === null) {
      // None: 名前付きならフィールドが無い/null、名前なしならどこかに null がある
      if (name !== null) return this.lookup(name).length === 0 || this.lookup(name).includes(null);
      return this.candidates(null).includes(null);
    }
    const values = this.candidates(name);
    if (typeof value !== 'string') return values.some((v) => v === value);

    const needle = normalizeTextInput(value, this.opts);
    return values.some((v) => {
      if (typeof v !== 'string') return false;
      const text = normalizeTextInput(v, this.opts);
      return name === null ? text.includes(needle) : text === needle;
    });
  }

  visitFieldRange(node: FieldRangeQuery): boolean {
    const lowerOp: RangeOp = node.isExclusive ? 'gt' : 'gte';
    const upperOp: RangeOp = node.isExclusive ? 'lt' : 'lte';
    // 型違いで例外にするのは名前付きのスカラーフィールドだけ。
    // 名前なし（全フィールド走査）や配列の要素では、境界と型が違う値を読み飛ばす
    const strict = node.name !== null && !crossesArray(this.record, node.name.split('.'));
    return this.candidates(node.name).some((v) => {
      if (v === null || v === undefined) return false;
      if (!strict && !(sameKind(v, node.start) && sameKind(v, node.end))) return false;
      const lowerOk = node.start === null || cmp(lowerOp, v, node.start);
      const upperOk = node.end === null || cmp(upperOp, v, node.end);
      return lowerOk && upperOk;
    });
  }

  visitFieldWildcard(node: FieldWildcardQuery): boolean {
    const re = wildcardToRegExp(normalizeTextInput(node.value, this.opts));
    return this.candidates(node.name).some((v) => typeof v === 'string' && re.test(normalizeTextInput(v, this.opts)));
  }

  // 名前付きならそのフィールド、名前なしなら既定フィールドすべての値
  private candidates(name: string | null): unknown[] {
    if (name !== null) return this.lookup(name);
    const fields = this.opts.defaultFields ?? Object.keys(this.record);
    return fields.flatMap((field) => this.lookup(field));
  }

  private lookup(name: string): unknown[] {
    return collectValues(this.record, name.split('.'));
  }
}

/**
 * パス解決ユーティリティ。
 * ドット区切りのセグメントを順に辿る。途中に配列があれば各要素へ展開し、
 * 末端が配列ならその要素を値として返す（ingredients.name のような参照を許す）。
 */
function collectValues(current: unknown, segments: readonly string[]): unknown[] {
  if (Array.isArray(current)) {
    return current.flatMap((elem: unknown) => collectValues(elem, segments));
  }
  const [head, ...tail] = segments;
  if (head === undefined) return current === undefined ? [] : [current];
  if (!isRecord(current)) return [];
  return collectValues(current[head], tail);
}

// パスの途中または末端に配列があるか
function crossesArray(current: unknown, segments: readonly string[]): boolean {
  if (Array.isArray(current)) return true;
  const [head, ...tail] = segments;
  if (head === undefined || !isRecord(current)) return false;
  return crossesArray(current[head], tail);
}

// 開いた端はどの値とも比べられる
function sameKind(value: unknown, bound: Value): boolean {
  if (bound === null) return true;
  return (typeof bound === 'number' || typeof bound === 'string') && typeof value === typeof bound;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// 文字列前処理: foldDiacritics/ignoreCase 両対応
function normalizeTextInput(s: string, opts: InternalOptions): string {
  let out = s;
  if (opts.foldDiacritics) {
    // \u0300-\u036f は結合ダイアクリティカルマークの主要ブロック
    out = out.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
  }
  // 大文字小文字の正規化（ロケール依存）
  if (opts.ignoreCase) {
    out = out.toLocaleLowerCase(opts.locale);
  }
  return out;
}

// number 同士 / string 同士のみ比較できる。それ以外は E_EVAL_TYPE_MISMATCH
function cmp(op: RangeOp, a: unknown, b: Value): boolean {
  let order: number;
  if (typeof a === 'number' && typeof b === 'number') order = a - b;
  else if (typeof a === 'string' && typeof b === 'string') order = a < b ? -1 : a > b ? 1 : 0;
  else return failTypeMismatch(op, 'number|string', `${typeof a}/${b === null ? 'null' : typeof b}`);

  switch (op) {
    case 'gt':
      return order > 0;
    case 'gte':
      return order >= 0;
    case 'lt':
      return order < 0;
    case 'lte':
      return order <= 0;
  }
}

// * → 任意の並び、? → 任意の1文字。エスケープされた文字はそのまま
export function wildcardToRegExp(pattern: string): RegExp {
  let source = '';
  let escape = false;
  for (const c of pattern) {
    if (escape) {
      source += escapeRegExp(c);
      escape = false;
    } else if (c === ESCAPE_CHAR) {
      escape = true;
    } else if (c === '*') {
      source += '[\\s\\S]*';
    } else if (c === '?') {
      source += '[\\s\\S]';
    } else {
      source += escapeRegExp(c);
    }
  }
  return new RegExp(`^${source}$`, 'u');
}

function escapeRegExp(c: string): string {
  return c.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}
