// src/parser/categories.ts
import { createToken, Lexer } from 'chevrotain';

// すべてのトークンの基底カテゴリ。
// Chevrotainのカテゴリはフィルタリング用途であり、字句解析で直接マッチすることはありません（Lexer.NA）。
export const Token = createToken({ name: 'Token', pattern: Lexer.NA });

// 予約語（AND/OR/NOT/TO/true/false/None）。Term より優先される。
export const Keyword = createToken({ name: 'Keyword', pattern: Lexer.NA, categories: Token });

// 値として読めるトークン（Quoted/Number/Term と true/false/None）。パーサーはこのカテゴリで値を受ける
export const ValueToken = createToken({ name: 'ValueToken', pattern: Lexer.NA, categories: Token });
