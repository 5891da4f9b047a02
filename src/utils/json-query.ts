import jmespath from 'jmespath';
import type { JsonValue } from '../types/json.js';
import { toJsonValue } from '../types/json.js';

/** Evaluates a query expression against a JSON value. */
export type QueryFn = (data: JsonValue, expression: string) => JsonValue;

/**
 * JMESPath search returning a JsonValue. A projection that produces nothing
 * comes back as null.
 */
export const searchJson: QueryFn = (data, expression) => {
  const result: unknown = jmespath.search(data, expression);
  return toJsonValue(result) ?? null;
};

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Quotes a key that is not a bare JMESPath identifier. */
export function quoteSegment(segment: string): string {
  return IDENTIFIER_RE.test(segment) ? segment : JSON.stringify(segment);
}

/** JMESPath truthiness: empty strings, arrays and objects are false. */
export function isTruthy(value: JsonValue | undefined): boolean {
  if (value === undefined || value === null || value === false) return false;
  if (typeof value === 'string') return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object') return Object.keys(value).length > 0;
  return true;
}
