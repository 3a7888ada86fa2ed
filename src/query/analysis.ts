// src/query/analysis.ts
// 木の形状を調べる組み込み Visitor 群。
// 深さ/ノード数の上限はコアでは強制せず、呼び出し側（parser など）が assertQueryBounds で課す。

import type { Query, FieldQuery } from './types.ts';
import type { QueryVisitor } from './visitor.ts';
import { accept } from './visitor.ts';
import { failLimitExceeded } from './queryErrors.ts';

export interface QueryShape {
  depth: number;
  size: number;
}

export type QueryBounds = {
  maxDepth?: number;
  maxSize?: number;
};

const LEAF: QueryShape = { depth: 1, size: 1 };

class ShapeVisitor implements QueryVisitor<QueryShape> {
  visitPhrase(_node: unknown, terms: QueryShape[]): QueryShape {
    return {
      depth: Math.max(0, ...terms.map((t) => t.depth)) + 1,
      size: terms.reduce((sum, t) => sum + t.size, 1),
    };
  }
  visitBinaryOp(_node: unknown, left: QueryShape, right: QueryShape): QueryShape {
    return { depth: Math.max(left.depth, right.depth) + 1, size: left.size + right.size + 1 };
  }
  visitUnaryOp(_node: unknown, operand: QueryShape): QueryShape {
    return { depth: operand.depth + 1, size: operand.size + 1 };
  }
  visitFieldValue(): QueryShape {
    return LEAF;
  }
  visitFieldRange(): QueryShape {
    return LEAF;
  }
  visitFieldWildcard(): QueryShape {
    return LEAF;
  }
}

export function measureQuery(query: Query): QueryShape {
  return accept(query, new ShapeVisitor());
}

export function assertQueryBounds(query: Query, bounds: QueryBounds): QueryShape {
  const shape = measureQuery(query);
  if (bounds.maxDepth !== undefined && shape.depth > bounds.maxDepth) {
    failLimitExceeded('depth', shape.depth, bounds.maxDepth);
  }
  if (bounds.maxSize !== undefined && shape.size > bounds.maxSize) {
    failLimitExceeded('size', shape.size, bounds.maxSize);
  }
  return shape;
}

class FieldNameVisitor implements QueryVisitor<string[]> {
  visitPhrase(_node: unknown, terms: string[][]): string[] {
    return terms.flat();
  }
  visitBinaryOp(_node: unknown, left: string[], right: string[]): string[] {
    return [...left, ...right];
  }
  visitUnaryOp(_node: unknown, operand: string[]): string[] {
    return operand;
  }
  visitFieldValue(node: FieldQuery): string[] {
    return fieldName(node);
  }
  visitFieldRange(node: FieldQuery): string[] {
    return fieldName(node);
  }
  visitFieldWildcard(node: FieldQuery): string[] {
    return fieldName(node);
  }
}

function fieldName(node: FieldQuery): string[] {
  return node.name === null ? [] : [node.name];
}

// 名前付きフィールドを初出順・重複なしで返す（名前なしの値は含めない）
export function collectFieldNames(query: Query): string[] {
  return [...new Set(accept(query, new FieldNameVisitor()))];
}
