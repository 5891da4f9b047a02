import { describe, it, expect } from 'vitest';
import { evaluateCondition, jsonEquals } from '../../../src/utils/operators.js';
import type { ConditionOperator, RuleCondition } from '../../../src/types/condition.js';
import type { JsonValue } from '../../../src/types/json.js';
import type { ResolveResult } from '../../../src/utils/path-resolver.js';

function condition(operator: ConditionOperator, value?: JsonValue): RuleCondition {
  return {
    operator,
    field: 'x',
    requireExt: false,
    ...(value !== undefined && { value }),
  };
}

const found = (value: JsonValue): ResolveResult => ({ status: 'found', value });
const missing: ResolveResult = { status: 'missing', depth: 0 };

describe('jsonEquals', () => {
  it('compares structurally', () => {
    expect(jsonEquals({ a: [1, { b: 'c' }] }, { a: [1, { b: 'c' }] })).toBe(true);
    expect(jsonEquals({ a: 1 }, { a: 1, b: 2 })).toBe(false);
    expect(jsonEquals([1, 2], [2, 1])).toBe(false);
    expect(jsonEquals({ a: 1 }, [1])).toBe(false);
    expect(jsonEquals(null, null)).toBe(true);
    expect(jsonEquals(0, null)).toBe(false);
  });
});

describe('evaluateCondition', () => {
  describe('exists', () => {
    it('is true for any non-null value', () => {
      expect(evaluateCondition(condition('exists'), found(0))).toBe(true);
      expect(evaluateCondition(condition('exists'), found(''))).toBe(true);
    });

    it('is false for null and missing fields', () => {
      expect(evaluateCondition(condition('exists'), found(null))).toBe(false);
      expect(evaluateCondition(condition('exists'), missing)).toBe(false);
    });
  });

  describe('matches_query', () => {
    it('follows JMESPath truthiness', () => {
      expect(evaluateCondition(condition('matches_query'), found('x'))).toBe(true);
      expect(evaluateCondition(condition('matches_query'), found([]))).toBe(false);
      expect(evaluateCondition(condition('matches_query'), found({}))).toBe(false);
      expect(evaluateCondition(condition('matches_query'), found(0))).toBe(true);
      expect(evaluateCondition(condition('matches_query'), missing)).toBe(false);
    });
  });

  describe('equals / not_equals', () => {
    it('compares deeply with the literal', () => {
      expect(evaluateCondition(condition('equals', { a: [1] }), found({ a: [1] }))).toBe(true);
      expect(evaluateCondition(condition('equals', 'A'), found('a'))).toBe(false);
      expect(evaluateCondition(condition('not_equals', 'A'), found('a'))).toBe(true);
    });

    it('treats a missing field as null', () => {
      expect(evaluateCondition(condition('equals', 'A'), missing)).toBe(false);
      expect(evaluateCondition(condition('equals', null), missing)).toBe(true);
      expect(evaluateCondition(condition('not_equals', 'A'), missing)).toBe(true);
    });
  });

  describe('in', () => {
    it('checks membership in the configured list', () => {
      expect(evaluateCondition(condition('in', ['a', 'b']), found('b'))).toBe(true);
      expect(evaluateCondition(condition('in', ['a', 'b']), found('c'))).toBe(false);
    });

    it('is false when the literal is not a list', () => {
      expect(evaluateCondition(condition('in', 'abc'), found('a'))).toBe(false);
    });
  });

  describe('contains', () => {
    it('checks substrings of strings', () => {
      expect(evaluateCondition(condition('contains', 'world'), found('hello world'))).toBe(true);
      expect(evaluateCondition(condition('contains', 'moon'), found('hello world'))).toBe(false);
    });

    it('checks members of arrays', () => {
      expect(evaluateCondition(condition('contains', 2), found([1, 2, 3]))).toBe(true);
      expect(evaluateCondition(condition('contains', { id: 1 }), found([{ id: 1 }]))).toBe(true);
    });

    it('checks keys of objects', () => {
      expect(evaluateCondition(condition('contains', 'k'), found({ k: 1 }))).toBe(true);
      expect(evaluateCondition(condition('contains', 'x'), found({ k: 1 }))).toBe(false);
      expect(evaluateCondition(condition('contains', 'toString'), found({ k: 1 }))).toBe(false);
    });

    it('is false for other values', () => {
      expect(evaluateCondition(condition('contains', 1), found(1))).toBe(false);
      expect(evaluateCondition(condition('contains', 'a'), missing)).toBe(false);
    });
  });

  describe('greater_than / less_than', () => {
    it('compares numbers', () => {
      expect(evaluateCondition(condition('greater_than', 3), found(5))).toBe(true);
      expect(evaluateCondition(condition('greater_than', 5), found(5))).toBe(false);
      expect(evaluateCondition(condition('less_than', 10), found(5))).toBe(true);
    });

    it('compares strings of the same type', () => {
      expect(evaluateCondition(condition('greater_than', '2024-01-01'), found('2024-06-01'))).toBe(true);
      expect(evaluateCondition(condition('less_than', 'b'), found('a'))).toBe(true);
    });

    it('is false for mixed types and absent fields', () => {
      expect(evaluateCondition(condition('greater_than', 3), found('5'))).toBe(false);
      expect(evaluateCondition(condition('less_than', 3), missing)).toBe(false);
    });
  });
});
