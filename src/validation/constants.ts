/**
 * Shared validation constants.
 *
 * Single source of truth for operators, strategy names, query kinds and
 * parameter types. Used by the config validator, the normaliser and the
 * runtime components.
 *
 * @module
 */

import type { ConditionOperator } from '../types/condition.js';
import type { StrategyName } from '../types/action.js';
import type { ParameterType, QueryKind } from '../types/parameter.js';
import type { MergePolicy } from '../types/rule.js';

export const CONDITION_OPERATORS: readonly ConditionOperator[] = [
  'exists', 'matches_query',
  'equals', 'not_equals',
  'in', 'contains',
  'greater_than', 'less_than',
];

export const STRATEGY_NAMES: readonly StrategyName[] = [
  'set_fixed_value', 'set_value', 'event_field', 'extract_value',
  'datetime_now', 'entity_data', 'context_value', 'time_difference',
];

export const QUERY_KINDS: readonly QueryKind[] = ['save', 'find', 'find_tidnid'];

export const PARAMETER_TYPES: readonly ParameterType[] = ['structural', 'parameter'];

export const MERGE_POLICIES: readonly MergePolicy[] = ['overwrite', 'first_wins'];

/** Structural placeholders with a built-in resolver. */
export const STRUCTURAL_PLACEHOLDERS = ['entity_names', 'table_name', 'schema_name'] as const;

export function isConditionOperator(value: string): value is ConditionOperator {
  return CONDITION_OPERATORS.some((operator) => operator === value);
}

/** Case-insensitive, like the registry lookup. */
export function isStrategyName(value: string): boolean {
  const normalized = value.toLowerCase();
  return STRATEGY_NAMES.some((name) => name === normalized);
}

export function isQueryKind(value: string): value is QueryKind {
  return QUERY_KINDS.some((kind) => kind === value);
}

export function isParameterType(value: string): value is ParameterType {
  return PARAMETER_TYPES.some((type) => type === value);
}

export function isMergePolicy(value: string): value is MergePolicy {
  return MERGE_POLICIES.some((policy) => policy === value);
}

/** Timestamp accepted in validity periods: `2024-01-01T00:00:00Z`, optional fraction and offset. */
export const ISO_TIMESTAMP_RE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

/** ISO timestamp whose calendar fields exist (`2020-02-31` does not). */
export function isIsoTimestamp(value: unknown): value is string {
  if (typeof value !== 'string') return false;
  const match = ISO_TIMESTAMP_RE.exec(value);
  if (match === null) return false;

  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  if (year === undefined || month === undefined || day === undefined
    || hour === undefined || minute === undefined || second === undefined) {
    return false;
  }

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  return date.getUTCFullYear() === year
    && date.getUTCMonth() === month - 1
    && date.getUTCDate() === day
    && date.getUTCHours() === hour
    && date.getUTCMinutes() === minute
    && date.getUTCSeconds() === second;
}
