// src/query/syntax.ts
// レンダラ(render.ts)とパーサ(tokens.ts)が共有する字句上の約束事。
// どちらか一方だけを変更すると往復（tree → text → tree）が壊れるため、ここに集約する。

export const KW_AND = 'AND';
export const KW_OR = 'OR';
export const KW_NOT = 'NOT';
export const KW_TO = 'TO';

export const OP_INCLUDE = '+';
export const OP_EXCLUDE = '-';

// 値が無いことを表すトークン（範囲の開いた端、FieldValue の null）
export const NULL_TOKEN = 'None';

export const ESCAPE_CHAR = '\\';

// 1文字でも含めばテキストを引用符で囲む
export const RESERVED_CHARS = ' +-&|!(){}[]^"~*?:\\';

// 裸で書くと別のトークンとして読まれる語
export const RESERVED_WORDS: ReadonlySet<string> = new Set([
  KW_AND,
  KW_OR,
  KW_NOT,
  KW_TO,
  'true',
  'false',
  NULL_TOKEN,
]);

// 符号なし。符号は単項演算子/範囲側で扱う
export const NUMBER_PATTERN = /(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/;

const NUMBER_ONLY = new RegExp(`^${NUMBER_PATTERN.source}$`);

export const FIELD_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

export function looksLikeNumber(text: string): boolean {
  return NUMBER_ONLY.test(text);
}

export function isReservedChar(c: string): boolean {
  return RESERVED_CHARS.includes(c) || /\s/.test(c);
}
