// src/query/nodes.ts
// ノードの生成と不変条件の検証。
// 不正な引数は生成時点で InvalidExpressionError とし、後段（render/visitor）に持ち込まない。
// 生成したノードは Object.freeze 済みで、変換は常に新しい木を作る。

import type {
  Query,
  QueryType,
  Value,
  BinaryOperator,
  UnaryOperator,
  PhraseQuery,
  BinaryOpQuery,
  UnaryOpQuery,
  FieldValueQuery,
  FieldWildcardQuery,
  FieldRangeQuery,
} from './types.ts';
import { ESCAPE_CHAR, FIELD_NAME_PATTERN, KW_AND, KW_NOT, KW_OR, OP_EXCLUDE, OP_INCLUDE, RESERVED_WORDS } from './syntax.ts';
import { failInvalidExpression } from './queryErrors.ts';

const QUERY_TYPES: ReadonlySet<string> = new Set<QueryType>([
  'Phrase',
  'BinaryOp',
  'UnaryOp',
  'FieldValue',
  'FieldWildcard',
  'FieldRange',
]);

const BINARY_OPERATORS: ReadonlySet<string> = new Set<BinaryOperator>([KW_AND, KW_OR]);
const UNARY_OPERATORS: ReadonlySet<string> = new Set<UnaryOperator>([KW_NOT, OP_INCLUDE, OP_EXCLUDE]);

export function isQuery(x: unknown): x is Query {
  return typeof x === 'object' && x !== null && 'type' in x && typeof x.type === 'string' && QUERY_TYPES.has(x.type);
}

export function isValue(x: unknown): x is Value {
  if (x === null) return true;
  if (typeof x === 'number') return Number.isFinite(x);
  return typeof x === 'string' || typeof x === 'boolean';
}

/**
 * ワイルドカードとして解釈できるテキストかを判定する。
 * - `\` は直後の1文字をエスケープする
 * - エスケープされていない `*` / `?` が1つ以上必要
 * - エスケープされていない空白を含む場合は false
 */
export function isWildcardText(value: Value): value is string {
  if (typeof value !== 'string') return false;

  let escape = false;
  let wildcardSeen = false;
  for (const c of value) {
    if (escape) {
      escape = false;
    } else if (c === ESCAPE_CHAR) {
      escape = true;
    } else if (c === '*' || c === '?') {
      wildcardSeen = true;
    } else if (/\s/.test(c)) {
      return false;
    }
  }
  return wildcardSeen;
}

function checkName(nodeType: QueryType, name: string | null): string | null {
  if (name === null) return null;
  if (typeof name !== 'string' || !FIELD_NAME_PATTERN.test(name)) {
    failInvalidExpression(nodeType, `field name ${JSON.stringify(name)} must match ${FIELD_NAME_PATTERN}`);
  }
  if (RESERVED_WORDS.has(name)) {
    failInvalidExpression(nodeType, `field name ${JSON.stringify(name)} is a reserved word`);
  }
  return name;
}

function checkValue(nodeType: QueryType, value: Value): Value {
  if (!isValue(value)) {
    failInvalidExpression(nodeType, `unsupported value ${String(value)} (expected text, finite number, boolean or null)`);
  }
  return value;
}

function checkChild(nodeType: QueryType, child: Query): Query {
  if (!isQuery(child)) {
    failInvalidExpression(nodeType, 'operand is not a query node');
  }
  return child;
}

// 生成関数は variant 名と同名。repr 出力（toRepr）はこのシグネチャに合わせている
export const QueryConstructors = {
  Phrase(terms: readonly Query[]): PhraseQuery {
    const copy = Object.freeze(terms.map((t) => checkChild('Phrase', t)));
    return Object.freeze({ type: 'Phrase', terms: copy });
  },

  BinaryOp(operator: BinaryOperator, left: Query, right: Query): BinaryOpQuery {
    if (!BINARY_OPERATORS.has(operator)) {
      failInvalidExpression('BinaryOp', `unknown operator ${JSON.stringify(operator)}`);
    }
    return Object.freeze({
      type: 'BinaryOp',
      operator,
      left: checkChild('BinaryOp', left),
      right: checkChild('BinaryOp', right),
    });
  },

  UnaryOp(operator: UnaryOperator, operand: Query): UnaryOpQuery {
    if (!UNARY_OPERATORS.has(operator)) {
      failInvalidExpression('UnaryOp', `unknown operator ${JSON.stringify(operator)}`);
    }
    return Object.freeze({ type: 'UnaryOp', operator, operand: checkChild('UnaryOp', operand) });
  },

  FieldValue(name: string | null, value: Value): FieldValueQuery {
    return Object.freeze({
      type: 'FieldValue',
      name: checkName('FieldValue', name),
      value: checkValue('FieldValue', value),
    });
  },

  FieldWildcard(name: string | null, value: string): FieldWildcardQuery {
    if (typeof value !== 'string') {
      failInvalidExpression('FieldWildcard', 'value must be text');
    }
    if (!isWildcardText(value)) {
      failInvalidExpression(
        'FieldWildcard',
        `${JSON.stringify(value)} needs an unescaped '*' or '?' and no unescaped whitespace`,
      );
    }
    return Object.freeze({ type: 'FieldWildcard', name: checkName('FieldWildcard', name), value });
  },

  FieldRange(name: string | null, start: Value, end: Value, isExclusive = false): FieldRangeQuery {
    checkValue('FieldRange', start);
    checkValue('FieldRange', end);
    if (start === null && end === null) {
      failInvalidExpression('FieldRange', 'at least one of start and end must be given');
    }
    if (typeof isExclusive !== 'boolean') {
      failInvalidExpression('FieldRange', 'isExclusive must be a boolean');
    }
    return Object.freeze({
      type: 'FieldRange',
      name: checkName('FieldRange', name),
      start,
      end,
      isExclusive,
    });
  },
};
