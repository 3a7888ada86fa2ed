// src/parser/index.ts
// 公開API: クエリ文字列をクエリ木へ変換します（CSTは内部実装に隠蔽）。
// toQueryString() の出力を読み戻せることが最低限の契約です。

import { Lexer, tokenMatcher } from 'chevrotain';
import type { IRecognitionException, IToken } from 'chevrotain';
import { allTokens, Bang, LParen, Minus, Not, Plus, RParen } from './tokens.ts';
import { queryParser } from './parser.ts';
import { queryBuilderVisitor } from './visitor.ts';
import { failLimitExceeded, failUnexpectedToken } from './parserErrors.ts';
import type { Query } from '../query/types.ts';
import { assertQueryBounds } from '../query/analysis.ts';
import { InvalidExpressionError, ParseError } from '../errors/errors.ts';

const lexer = new Lexer(allTokens);

export const DEFAULT_MAX_DEPTH = 64;
export const DEFAULT_MAX_SIZE = 1024;

export type ParseOptions = {
  // 木の深さの上限（括弧や前置演算子の入れ子もこの値で打ち切る）
  maxDepth?: number;
  // ノード数の上限
  maxSize?: number;
};

export type ParseResult = {
  query: Query;
  tokens: IToken[];
};

export function parse(input: string, options: ParseOptions = {}): ParseResult {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const maxSize = options.maxSize ?? DEFAULT_MAX_SIZE;

  // 1) Lexing
  // Lexer エラーの標準化 — ライブラリ内ロギングはせず、ParseError に正規化
  const lexResult = lexer.tokenize(input);
  const lexError = lexResult.errors[0];
  if (lexError) {
    const firstSentence = (lexError.message ?? 'Lexing error').split('\n')[0] ?? 'Lexing error';
    // “unexpected character” を Unexpected 系として昇格（それ以外は Generic）
    const isUnexpected = firstSentence.toLowerCase().includes('unexpected character');
    const code = isUnexpected ? 'E_PARSE_UNEXPECTED_TOKEN' : 'E_PARSE_GENERIC';
    throw new ParseError(firstSentence, lexError.line, lexError.column, undefined, code);
  }

  // 2) 入れ子の事前チェック（再帰下降で深く潜る前に打ち切る）
  checkNesting(lexResult.tokens, maxDepth);

  // 3) Parsing (CST)
  queryParser.input = lexResult.tokens;
  const cst = queryParser.query();

  const firstError: IRecognitionException | undefined = queryParser.errors[0];
  if (firstError) {
    const token = firstError.token;
    // 余分な入力（閉じ括弧の過多など）は期待外トークンとして扱う
    if (firstError.name === 'NotAllInputParsedException') {
      failUnexpectedToken(token, 'end of input');
    }
    // Chevrotainのエラーメッセージは複数行にわたるため第一文のみ採用
    const message = firstError.message.split('\n')[0] ?? firstError.message;
    throw new ParseError(
      message,
      Number.isNaN(token.startLine) ? undefined : token.startLine,
      Number.isNaN(token.startColumn) ? undefined : token.startColumn,
      token.image,
      'E_PARSE_GENERIC',
    );
  }

  // 4) CST -> クエリ木（Visitor）
  const query = queryBuilderVisitor.visit(cst);

  // 5) 形状の上限
  try {
    assertQueryBounds(query, { maxDepth, maxSize });
  } catch (e) {
    if (e instanceof InvalidExpressionError) failLimitExceeded(e.message);
    throw e;
  }

  // デバッグ・ツール連携を考慮し tokens も返す
  return { query, tokens: lexResult.tokens };
}

// 括弧の入れ子と、連続する前置演算子（NOT NOT ... / +-+- ...）の長さを数える
function checkNesting(tokens: IToken[], maxDepth: number): void {
  let depth = 0;
  let prefixRun = 0;
  for (const token of tokens) {
    if (tokenMatcher(token, LParen)) depth++;
    else if (tokenMatcher(token, RParen)) depth--;

    const isPrefix =
      tokenMatcher(token, Not) || tokenMatcher(token, Bang) || tokenMatcher(token, Plus) || tokenMatcher(token, Minus);
    prefixRun = isPrefix ? prefixRun + 1 : 0;

    if (depth > maxDepth || prefixRun > maxDepth) {
      failLimitExceeded(`Query nesting exceeds the limit of ${maxDepth}.`);
    }
  }
}
