// test/error.test.ts
import { describe, it, expect } from 'vitest';
import {
  FieldQueryError,
  InvalidExpressionError,
  ParseError,
  EvaluationError,
  AdapterError,
  formatLocation,
} from '../src/errors/errors.ts';

describe('error types', () => {
  it('share the base class and keep their layer code', () => {
    const errors = [
      new InvalidExpressionError('bad node', 'FieldRange'),
      new ParseError('bad text', 1, 4, 'x'),
      new EvaluationError('bad record'),
      new AdapterError('bad target', 'sqlite'),
    ];
    for (const e of errors) {
      expect(e).toBeInstanceOf(FieldQueryError);
      expect(e).toBeInstanceOf(Error);
    }
    expect(errors.map((e) => e.code)).toEqual([
      'E_QUERY_INVALID_EXPRESSION',
      'E_PARSE_GENERIC',
      'E_EVAL_GENERIC',
      'E_ADAPTER_GENERIC',
    ]);
    expect(errors.map((e) => e.name)).toEqual(['InvalidExpressionError', 'ParseError', 'EvaluationError', 'AdapterError']);
  });

  it('formats locations only when both parts are known', () => {
    expect(formatLocation(2, 5)).toBe('2:5');
    expect(formatLocation(2)).toBe('');
    expect(formatLocation()).toBe('');
  });
});
