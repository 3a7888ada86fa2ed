// src/parser/visitor.ts
// 目的: ChevrotainのCSTをクエリ木へ変換するVisitor実装
// 命名規約: メソッド名はCSTルール名に一致。ノードの生成はすべて QueryBuilder 経由。

import type { CstNode, IToken } from 'chevrotain';
import { tokenMatcher } from 'chevrotain';
import type { Query, Value } from '../query/types.ts';
import { QueryBuilder } from '../query/builder.ts';
import { isWildcardText } from '../query/nodes.ts';
import { InvalidExpressionError } from '../errors/errors.ts';
import { failAt } from './parserErrors.ts';
import { queryParser } from './parser.ts';
import {
  False,
  LBrace,
  Minus,
  NumberLiteral,
  Null,
  QuotedString,
  RBrace,
  Term,
  True,
} from './tokens.ts';

// ---- CST の子要素の形（parser.ts の LABEL / トークン名と対応） ----

interface QueryCstChildren {
  clauses?: CstNode[];
}
interface BinaryCstChildren {
  lhs: CstNode[];
  rhs?: CstNode[];
}
interface NotExpressionCstChildren {
  argument?: CstNode[];
  signedExpression?: CstNode[];
}
interface SignedExpressionCstChildren {
  sign?: IToken[];
  argument?: CstNode[];
  primary?: CstNode[];
}
interface PrimaryCstChildren {
  group?: CstNode[];
  fieldExpression?: CstNode[];
}
interface GroupCstChildren {
  query: CstNode[];
}
interface FieldExpressionCstChildren {
  head?: IToken[];
  Colon?: IToken[];
  sign?: IToken[];
  value?: IToken[];
  range?: CstNode[];
}
interface RangeCstChildren {
  open: IToken[];
  close: IToken[];
  lowerSign?: IToken[];
  lower: IToken[];
  upperSign?: IToken[];
  upper: IToken[];
}

// 値位置のトークンを読んだ結果（ワイルドカードは FieldWildcard になる）
type ScalarToken = { kind: 'value'; value: Value } | { kind: 'wildcard'; pattern: string };

// visit の第2引数でフィールド名を range に渡す
const BaseCstVisitor = queryParser.getBaseCstVisitorConstructor<string | null, Query>();

export class QueryBuilderVisitor extends BaseCstVisitor {
  constructor() {
    super();
    // 実装されたVisitorメソッドがパーサーの全ルールをカバーしているか検証
    this.validateVisitor();
  }

  query(ctx: QueryCstChildren): Query {
    const clauses = (ctx.clauses ?? []).map((c) => this.visit(c));
    const [only] = clauses;
    // 1項だけなら Phrase で包まない
    if (clauses.length === 1 && only !== undefined) return only;
    return QueryBuilder.phrase(...clauses);
  }

  orExpression(ctx: BinaryCstChildren): Query {
    // 左結合の二項演算子を処理する共通パターン
    let node = this.visit(ctx.lhs);
    (ctx.rhs ?? []).forEach((rhsNode) => {
      node = QueryBuilder.or(node, this.visit(rhsNode));
    });
    return node;
  }

  andExpression(ctx: BinaryCstChildren): Query {
    let node = this.visit(ctx.lhs);
    (ctx.rhs ?? []).forEach((rhsNode) => {
      node = QueryBuilder.and(node, this.visit(rhsNode));
    });
    return node;
  }

  notExpression(ctx: NotExpressionCstChildren): Query {
    if (ctx.argument) return QueryBuilder.not(this.visit(ctx.argument));
    return this.visit(required(ctx.signedExpression, 'signedExpression'));
  }

  signedExpression(ctx: SignedExpressionCstChildren): Query {
    const sign = ctx.sign?.[0];
    if (sign && ctx.argument) {
      const operand = this.visit(ctx.argument);
      return tokenMatcher(sign, Minus) ? QueryBuilder.exclude(operand) : QueryBuilder.include(operand);
    }
    return this.visit(required(ctx.primary, 'primary'));
  }

  primary(ctx: PrimaryCstChildren): Query {
    if (ctx.group) return this.visit(ctx.group);
    return this.visit(required(ctx.fieldExpression, 'fieldExpression'));
  }

  group(ctx: GroupCstChildren): Query {
    return this.visit(ctx.query);
  }

  fieldExpression(ctx: FieldExpressionCstChildren): Query {
    const head = ctx.head?.[0];
    if (!head) {
      // 名前なしの範囲
      return this.visit(required(ctx.range, 'range'), null);
    }
    if (!ctx.Colon) {
      return this.buildField(head, null, readScalar(head, undefined));
    }

    const name = this.fieldName(head);
    if (ctx.range) return this.visit(ctx.range, name);

    const valueToken = required(ctx.value, 'value')[0];
    return this.buildField(valueToken, name, readScalar(valueToken, ctx.sign?.[0]));
  }

  range(ctx: RangeCstChildren, name?: string | null): Query {
    const open = ctx.open[0];
    const close = ctx.close[0];
    const isExclusive = tokenMatcher(open, LBrace);
    if (isExclusive !== tokenMatcher(close, RBrace)) {
      failAt(close, `Range opened with '${open.image}' must be closed with '${isExclusive ? '}' : ']'}'`);
    }
    const start = readBound(ctx.lower[0], ctx.lowerSign?.[0]);
    const end = readBound(ctx.upper[0], ctx.upperSign?.[0]);
    return guard(open, () => QueryBuilder.range(start, end, { isExclusive, name: name ?? null }));
  }

  // ---- ユーティリティメソッド ----

  private fieldName(head: IToken): string {
    if (!tokenMatcher(head, Term) || isWildcardText(head.image)) {
      failAt(head, `Expected a field name before ':' but found '${head.image}'`);
    }
    return head.image;
  }

  private buildField(token: IToken, name: string | null, scalar: ScalarToken): Query {
    return guard(token, () =>
      scalar.kind === 'wildcard'
        ? QueryBuilder.wildcard(scalar.pattern, name)
        : QueryBuilder.value(scalar.value, name),
    );
  }
}

// 構文上必ず存在する子要素を取り出す（欠けていればパーサーとの不整合）
function required<T>(children: T[] | undefined, label: string): T[] {
  if (!children || children.length === 0) {
    throw new Error(`CST child '${label}' not found. Check parser labels.`);
  }
  return children;
}

// ノード生成時の不変条件違反を、位置情報付きの ParseError に載せ替える
function guard(token: IToken, build: () => Query): Query {
  try {
    return build();
  } catch (e) {
    if (e instanceof InvalidExpressionError) failAt(token, e.message);
    throw e;
  }
}

function readScalar(token: IToken, sign: IToken | undefined): ScalarToken {
  if (sign && !tokenMatcher(token, NumberLiteral)) {
    failAt(sign, `'-' may only prefix a number here, found '${token.image}'`);
  }
  if (tokenMatcher(token, NumberLiteral)) {
    const n = Number(token.image);
    return { kind: 'value', value: sign ? -n : n };
  }
  if (tokenMatcher(token, QuotedString)) return { kind: 'value', value: unquote(token.image) };
  if (tokenMatcher(token, True)) return { kind: 'value', value: true };
  if (tokenMatcher(token, False)) return { kind: 'value', value: false };
  if (tokenMatcher(token, Null)) return { kind: 'value', value: null };
  // Term: ワイルドカードはエスケープを残したまま、それ以外はエスケープを外す
  if (isWildcardText(token.image)) return { kind: 'wildcard', pattern: token.image };
  return { kind: 'value', value: unescape(token.image) };
}

// 範囲の端: 裸の * は None と同じく「開いた端」
function readBound(token: IToken, sign: IToken | undefined): Value {
  if (tokenMatcher(token, Term) && token.image === '*') return null;
  const scalar = readScalar(token, sign);
  if (scalar.kind === 'wildcard') {
    failAt(token, `Wildcards are not allowed in range bounds: '${token.image}'`);
  }
  return scalar.value;
}

// トークンのimage（"..."）から両端のダブルクオートを外し、エスケープを復元
function unquote(image: string): string {
  return unescape(image.slice(1, -1));
}

function unescape(text: string): string {
  return text.replace(/\\([\s\S])/g, '$1');
}

// ビジターのシングルトンインスタンスをエクスポート
export const queryBuilderVisitor = new QueryBuilderVisitor();
