// src/parser/parserErrors.ts
import { ParseError, formatLocation } from '../errors/errors.ts';

// トークン情報の型は chevrotain の IToken のうち使う部分だけ
export interface TokenLike {
  image: string;
  startLine?: number;
  startColumn?: number;
}

// 代表ケース: 期待外トークン
export function failUnexpectedToken(token: TokenLike, expected: string): never {
  const loc = formatLocation(token.startLine, token.startColumn);
  const msg = loc
    ? `Unexpected token '${token.image}' at ${loc}. Expected ${expected}.`
    : `Unexpected token '${token.image}'. Expected ${expected}.`;
  throw new ParseError(msg, token.startLine, token.startColumn, token.image, 'E_PARSE_UNEXPECTED_TOKEN');
}

// CST→木の変換中に見つかった意味的な誤り（範囲の括弧不一致、フィールド名の不正など）
export function failAt(token: TokenLike, message: string): never {
  const loc = formatLocation(token.startLine, token.startColumn);
  const msg = loc ? `${message} (at ${loc})` : message;
  throw new ParseError(msg, token.startLine, token.startColumn, token.image, 'E_PARSE_GENERIC');
}

export function failLimitExceeded(message: string): never {
  throw new ParseError(message, undefined, undefined, undefined, 'E_PARSE_LIMIT_EXCEEDED');
}
