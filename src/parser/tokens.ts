// src/parser/tokens.ts
import { createToken, Lexer } from 'chevrotain';
import { Token, Keyword, ValueToken } from './categories.ts';
import { KW_AND, KW_NOT, KW_OR, KW_TO, NULL_TOKEN, NUMBER_PATTERN } from '../query/syntax.ts';

// WhiteSpace は Lexer.SKIPPED とし、パーサーに渡さない。
export const WhiteSpace = createToken({
  name: 'WhiteSpace',
  pattern: /\s+/,
  group: Lexer.SKIPPED,
});

// ----- Terms -----
// 裸の語。予約文字はバックスラッシュでエスケープすれば含められる。
// 先頭に + / - は置けない（単項演算子として読む）。2文字目以降の + / - は語の一部。
// ワイルドカード（* ?）もここで受け、visitor 側で FieldWildcard と FieldValue に振り分ける。
export const Term = createToken({
  name: 'Term',
  pattern: /(?:[^\s+\-!&|(){}[\]^"~:\\]|\\[\s\S])(?:[^\s!&|(){}[\]^"~:\\]|\\[\s\S])*/,
  categories: ValueToken,
});

// ----- Keywords -----
// 大文字のみ（Lucene 互換）。longer_alt により ANDROID などは Term になる。
export const And = createToken({ name: 'And', pattern: new RegExp(KW_AND), longer_alt: Term, categories: Keyword });
export const Or = createToken({ name: 'Or', pattern: new RegExp(KW_OR), longer_alt: Term, categories: Keyword });
export const Not = createToken({ name: 'Not', pattern: new RegExp(KW_NOT), longer_alt: Term, categories: Keyword });
export const To = createToken({ name: 'To', pattern: new RegExp(KW_TO), longer_alt: Term, categories: Keyword });

export const True = createToken({ name: 'True', pattern: /true/, longer_alt: Term, categories: [Keyword, ValueToken] });
export const False = createToken({ name: 'False', pattern: /false/, longer_alt: Term, categories: [Keyword, ValueToken] });
export const Null = createToken({
  name: 'Null',
  pattern: new RegExp(NULL_TOKEN),
  longer_alt: Term,
  categories: [Keyword, ValueToken],
});

// ----- Operators -----
// 記号版の論理演算子（入力のみ受け付け、出力は常にキーワード）
export const AndSymbol = createToken({ name: 'AndSymbol', pattern: /&&/, start_chars_hint: ['&'] });
export const OrSymbol = createToken({ name: 'OrSymbol', pattern: /\|\|/, start_chars_hint: ['|'] });
export const Bang = createToken({ name: 'Bang', pattern: /!/, start_chars_hint: ['!'] });

export const Plus = createToken({ name: 'Plus', pattern: /\+/, start_chars_hint: ['+'] });
export const Minus = createToken({ name: 'Minus', pattern: /-/, start_chars_hint: ['-'] });
export const Colon = createToken({ name: 'Colon', pattern: /:/, start_chars_hint: [':'] });

// ----- Separators -----
export const LParen = createToken({ name: 'LParen', pattern: /\(/, start_chars_hint: ['('] });
export const RParen = createToken({ name: 'RParen', pattern: /\)/, start_chars_hint: [')'] });
export const LBracket = createToken({ name: 'LBracket', pattern: /\[/, start_chars_hint: ['['] });
export const RBracket = createToken({ name: 'RBracket', pattern: /]/, start_chars_hint: [']'] });
export const LBrace = createToken({ name: 'LBrace', pattern: /{/, start_chars_hint: ['{'] });
export const RBrace = createToken({ name: 'RBrace', pattern: /}/, start_chars_hint: ['}'] });

// ----- Literals -----
// 引用テキスト。`\x` は任意の1文字 x を表す（render.ts の quoteText と対）。
export const QuotedString = createToken({
  name: 'QuotedString',
  pattern: /"(?:[^\\"]|\\[\s\S])*"/,
  categories: ValueToken,
  start_chars_hint: ['"'],
});

// 符号なし。007 や 10abc のように続きがある場合は longer_alt で Term になる。
export const NumberLiteral = createToken({
  name: 'NumberLiteral',
  pattern: NUMBER_PATTERN,
  longer_alt: Term,
  categories: ValueToken,
});

// ----- Token order (priority) -----
// 重要: Chevrotain は配列順にマッチを試みます。
// 1) WhiteSpace（SKIPPED）
// 2) Keywords（Term より先に。longer_alt で長い語は Term へ）
// 3) Operators: 2文字（&& ||）を先に
// 4) Separators
// 5) Literals（NumberLiteral は Term より先）
// 6) Term（最後）
// 7) カテゴリ（Lexer.NA のため字句解析では使われないが、パーサーの語彙に含める）
export const allTokens = [
  WhiteSpace,

  // Keywords
  And, Or, Not, To, True, False, Null,

  // Operators
  AndSymbol, OrSymbol, Bang, Plus, Minus, Colon,

  // Separators
  LParen, RParen, LBracket, RBracket, LBrace, RBrace,

  // Literals
  QuotedString, NumberLiteral,

  // Terms
  Term,

  // Categories
  Token, Keyword, ValueToken,
];
