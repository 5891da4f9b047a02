import type { RuleCondition } from '../types/condition.js';
import type { JsonValue } from '../types/json.js';
import { isJsonObject } from '../types/json.js';
import type { ResolveResult } from './path-resolver.js';
import { isTruthy } from './json-query.js';

/**
 * Strukturální rovnost dvou JSON hodnot.
 */
export function jsonEquals(a: JsonValue | undefined, b: JsonValue | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined || a === null || b === null) return false;

  if (Array.isArray(a)) {
    return Array.isArray(b) && a.length === b.length && a.every((item, i) => jsonEquals(item, b[i]));
  }
  if (typeof a === 'object' && typeof b === 'object' && !Array.isArray(b)) {
    const keys = Object.keys(a);
    return keys.length === Object.keys(b).length
      && keys.every((key) => key in b && jsonEquals(a[key], b[key]));
  }
  return false;
}

function compare(actual: JsonValue | undefined, expected: JsonValue | undefined): number | undefined {
  if (typeof actual === 'number' && typeof expected === 'number') {
    return actual - expected;
  }
  if (typeof actual === 'string' && typeof expected === 'string') {
    return actual < expected ? -1 : actual > expected ? 1 : 0;
  }
  return undefined;
}

/**
 * Vyhodnotí podmínku nad výsledkem resolveru.
 */
export function evaluateCondition(condition: RuleCondition, resolved: ResolveResult): boolean {
  const actual = resolved.status === 'found' ? resolved.value : undefined;
  const expected = condition.value;

  switch (condition.operator) {
    case 'exists':
      return actual !== undefined && actual !== null;

    case 'matches_query':
      return isTruthy(actual);

    case 'equals':
      return jsonEquals(actual ?? null, expected ?? null);

    case 'not_equals':
      return !jsonEquals(actual ?? null, expected ?? null);

    case 'in':
      return Array.isArray(expected) && expected.some((item) => jsonEquals(item, actual ?? null));

    case 'contains':
      if (typeof actual === 'string' && typeof expected === 'string') {
        return actual.includes(expected);
      }
      if (Array.isArray(actual)) {
        return actual.some((item) => jsonEquals(item, expected ?? null));
      }
      // Objekt obsahuje své klíče
      if (isJsonObject(actual) && typeof expected === 'string') {
        return Object.hasOwn(actual, expected);
      }
      return false;

    case 'greater_than': {
      const diff = compare(actual, expected);
      return diff !== undefined && diff > 0;
    }

    case 'less_than': {
      const diff = compare(actual, expected);
      return diff !== undefined && diff < 0;
    }

    default:
      return false;
  }
}
