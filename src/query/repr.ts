// src/query/repr.ts
// デバッグ/ゴールデン比較用の再構築表現。
// 各呼び出しに `Query.` を付ければそのまま木を組み直せる形（引数は生成関数と同じ並び）。

import type { Query, Value } from './types.ts';
import { assertNever } from './types.ts';
import { quoteText } from './render.ts';

export function toRepr(query: Query): string {
  switch (query.type) {
    case 'Phrase':
      return `Phrase([${query.terms.map(toRepr).join(', ')}])`;
    case 'BinaryOp':
      return `BinaryOp(${quoteText(query.operator)}, ${toRepr(query.left)}, ${toRepr(query.right)})`;
    case 'UnaryOp':
      return `UnaryOp(${quoteText(query.operator)}, ${toRepr(query.operand)})`;
    case 'FieldValue':
      return `FieldValue(${reprName(query.name)}, ${reprValue(query.value)})`;
    case 'FieldWildcard':
      return `FieldWildcard(${reprName(query.name)}, ${quoteText(query.value)})`;
    case 'FieldRange': {
      const args = [reprName(query.name), reprValue(query.start), reprValue(query.end)];
      // 既定値（inclusive）のときは省略
      if (query.isExclusive) args.push('true');
      return `FieldRange(${args.join(', ')})`;
    }
    default:
      return assertNever(query);
  }
}

function reprName(name: string | null): string {
  return name === null ? 'null' : quoteText(name);
}

// 条件付きではなく常に引用する（render の formatValue との違い）
function reprValue(value: Value): string {
  if (typeof value === 'string') return quoteText(value);
  return String(value);
}
