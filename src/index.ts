// src/index.ts
export * from './query/types.ts';
export { isQuery, isValue, isWildcardText } from './query/nodes.ts';
export * from './query/builder.ts';
export * from './query/visitor.ts';
export { toQueryString, formatValue, quoteText, needsQuoting, precedenceOf, PRECEDENCE } from './query/render.ts';
export * from './query/equals.ts';
export * from './query/repr.ts';
export * from './query/analysis.ts';
export * from './parser/index.ts';
export * from './evaluator/evaluator.ts';
export * from './adapters/sqlite/index.ts';
export * from './adapters/sqlite/client.ts';
export {
  FieldQueryError,
  InvalidExpressionError,
  ParseError,
  EvaluationError,
  AdapterError,
} from './errors/errors.ts';
export type { ErrorCode } from './errors/errors.ts';
