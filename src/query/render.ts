// src/query/render.ts
// クエリ木 → テキスト。括弧は必要最小限（子の優先順位が親より「厳密に低い」ときだけ付ける）。
// 出力は parser/index.ts の parse() で同じ木に読み戻せることを前提にしている。

import type { Query, Value, BinaryOperator, UnaryOperator } from './types.ts';
import { assertNever } from './types.ts';
import { KW_NOT, KW_OR, KW_TO, NULL_TOKEN, RESERVED_WORDS, isReservedChar, looksLikeNumber } from './syntax.ts';

export const PRECEDENCE = {
  Phrase: 400,
  OR: 500,
  AND: 600,
  NOT: 800,
  SIGN: 900,
  Field: 1000,
} as const;

export function binaryPrecedence(operator: BinaryOperator): number {
  return operator === KW_OR ? PRECEDENCE.OR : PRECEDENCE.AND;
}

export function unaryPrecedence(operator: UnaryOperator): number {
  return operator === KW_NOT ? PRECEDENCE.NOT : PRECEDENCE.SIGN;
}

export function precedenceOf(query: Query): number {
  switch (query.type) {
    case 'Phrase':
      return PRECEDENCE.Phrase;
    case 'BinaryOp':
      return binaryPrecedence(query.operator);
    case 'UnaryOp':
      return unaryPrecedence(query.operator);
    case 'FieldValue':
    case 'FieldWildcard':
    case 'FieldRange':
      return PRECEDENCE.Field;
    default:
      return assertNever(query);
  }
}

export function toQueryString(query: Query): string {
  switch (query.type) {
    case 'Phrase': {
      // 入れ子の Phrase は括弧で囲まないと外側に平坦化されてしまう
      return query.terms.map((t) => renderOperand(t, PRECEDENCE.Phrase + 1)).join(' ');
    }
    case 'BinaryOp': {
      const own = binaryPrecedence(query.operator);
      return `${renderOperand(query.left, own)} ${query.operator} ${renderOperand(query.right, own)}`;
    }
    case 'UnaryOp': {
      const operand = renderOperand(query.operand, unaryPrecedence(query.operator));
      // キーワード演算子のみ空白を挟む（+a / -a は詰める）
      return query.operator === KW_NOT ? `${query.operator} ${operand}` : `${query.operator}${operand}`;
    }
    case 'FieldValue':
      return withName(query.name, formatValue(query.value));
    case 'FieldWildcard':
      // 引用するとワイルドカードとして解釈されなくなるため常にそのまま
      return withName(query.name, query.value);
    case 'FieldRange': {
      const body = `${formatValue(query.start)} ${KW_TO} ${formatValue(query.end)}`;
      return withName(query.name, query.isExclusive ? `{${body}}` : `[${body}]`);
    }
    default:
      return assertNever(query);
  }
}

function renderOperand(child: Query, parentPrecedence: number): string {
  const text = toQueryString(child);
  return precedenceOf(child) < parentPrecedence ? `(${text})` : text;
}

function withName(name: string | null, text: string): string {
  return name === null ? text : `${name}:${text}`;
}

/**
 * スカラー値のテキスト表現。
 * テキストは予約文字・空白を含むとき、または裸で書くと別トークン（予約語/数値/空）に
 * 読まれてしまうときだけ引用符で囲む。
 */
export function formatValue(value: Value): string {
  if (value === null) return NULL_TOKEN;
  if (typeof value === 'string') return needsQuoting(value) ? quoteText(value) : value;
  return String(value);
}

export function needsQuoting(text: string): boolean {
  if (text === '' || RESERVED_WORDS.has(text) || looksLikeNumber(text)) return true;
  for (const c of text) {
    if (isReservedChar(c)) return true;
  }
  return false;
}

// `\` と `"` をバックスラッシュでエスケープして二重引用符で囲む
export function quoteText(text: string): string {
  return '"' + text.replace(/\\/g, '\\\\').replace(/"/g, '\\"') + '"';
}
