// src/query/queryErrors.ts
import { InvalidExpressionError } from '../errors/errors.ts';

export function failInvalidExpression(nodeType: string, detail: string): never {
  throw new InvalidExpressionError(`Invalid ${nodeType}: ${detail}`, nodeType, 'E_QUERY_INVALID_EXPRESSION');
}

export function failLimitExceeded(limit: string, actual: number, max: number): never {
  const msg = `Query ${limit} ${actual} exceeds the limit of ${max}.`;
  throw new InvalidExpressionError(msg, undefined, 'E_QUERY_LIMIT_EXCEEDED');
}
