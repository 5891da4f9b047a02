/**
 * Wire-format configuration → typed {@link SystemConfig}.
 *
 * Runs after validation, so it only has to pick the accepted aliases and
 * coerce flags and dates; anything still malformed is dropped rather than
 * guessed at.
 *
 * @module
 */

import type { JsonValue } from '../types/json.js';
import { toJsonValue } from '../types/json.js';
import type { RuleCondition } from '../types/condition.js';
import type { ActionParams, RuleAction, StrategyPayload } from '../types/action.js';
import type { Rule, ValidityPeriod } from '../types/rule.js';
import type { ParameterSpec, QueryConfig, QueryKind } from '../types/parameter.js';
import type { ConsumerConfig, FieldSpec, ServiceConfig, SystemConfig } from '../types/config.js';
import { isConditionOperator, isParameterType, isQueryKind } from '../validation/constants.js';
import { isObject, pickAlias } from '../validation/types.js';
import { ACTION_KIND_KEYS } from '../validation/validators/action.js';
import { parameterEntries } from '../validation/validators/query.js';
import {
  EVENT_TYPE_KEYS,
  RULE_ID_KEYS,
  VALIDITY_END_KEYS,
  VALIDITY_PERIOD_KEYS,
  VALIDITY_START_KEYS,
} from '../validation/validators/rule.js';
import { SERVICE_ID_KEYS } from '../validation/validators/service.js';

export function normalizeConfig(input: unknown): SystemConfig {
  if (Array.isArray(input)) {
    return { consumers: input.filter(isObject).map(normalizeConsumer), extensions: {} };
  }

  if (!isObject(input)) {
    return { consumers: [], extensions: {} };
  }

  const consumers = Array.isArray(input['consumers']) ? input['consumers'] : [];
  const extensions: Record<string, JsonValue> = {};
  if (isObject(input['extensions'])) {
    for (const [name, dataset] of Object.entries(input['extensions'])) {
      extensions[name] = toJsonValue(dataset) ?? null;
    }
  }

  return {
    ...(typeof input['version'] === 'string' && { version: input['version'] }),
    consumers: consumers.filter(isObject).map(normalizeConsumer),
    extensions,
  };
}

export function normalizeConsumer(input: Record<string, unknown>): ConsumerConfig {
  const services = Array.isArray(input['services']) ? input['services'] : [];
  const rules = Array.isArray(input['rules']) ? input['rules'] : [];

  return {
    id: stringOf(input['id']) ?? '',
    services: services.filter(isObject).map(normalizeService),
    rules: rules.filter(isObject).map(normalizeRule),
    queries: normalizeQueries(input['config']),
  };
}

function normalizeService(input: Record<string, unknown>): ServiceConfig {
  const paths = Array.isArray(input['paths']) ? input['paths'] : [];
  const entity = Array.isArray(input['entity']) ? input['entity'] : [];

  return {
    idService: stringOf(pickAlias(input, SERVICE_ID_KEYS)?.[1]) ?? '',
    paths: paths.flatMap((spec: unknown) => {
      const field = normalizeFieldSpec(spec);
      return field === undefined ? [] : [field];
    }),
    entity: entity.flatMap((name: unknown) => {
      const trimmed = stringOf(name);
      return trimmed === undefined ? [] : [trimmed];
    }),
  };
}

function normalizeFieldSpec(spec: unknown): FieldSpec | undefined {
  if (Array.isArray(spec)) {
    const [path, enabled = true]: unknown[] = spec;
    return typeof path === 'string' ? { path, enabled: toFlag(enabled, true) } : undefined;
  }
  if (isObject(spec) && typeof spec['path'] === 'string') {
    return { path: spec['path'], enabled: toFlag(spec['enabled'], true) };
  }
  return undefined;
}

export function normalizeRule(input: Record<string, unknown>): Rule {
  const conditions = Array.isArray(input['conditions']) ? input['conditions'] : [];
  const actions = Array.isArray(input['actions']) ? input['actions'] : [];
  const validityPeriod = normalizeValidity(pickAlias(input, VALIDITY_PERIOD_KEYS)?.[1]);

  return {
    id: stringOf(pickAlias(input, RULE_ID_KEYS)?.[1]) ?? '',
    eventType: stringOf(pickAlias(input, EVENT_TYPE_KEYS)?.[1]) ?? '',
    ...(typeof input['description'] === 'string' && { description: input['description'] }),
    priority: typeof input['priority'] === 'number' ? input['priority'] : 0,
    ...(validityPeriod !== undefined && { validityPeriod }),
    conditions: normalizeConditions(conditions),
    actions: actions.filter(isObject).flatMap((action) => {
      const normalized = normalizeAction(action);
      return normalized === undefined ? [] : [normalized];
    }),
  };
}

function normalizeValidity(input: unknown): ValidityPeriod | undefined {
  if (!isObject(input)) return undefined;

  const start = toDate(pickAlias(input, VALIDITY_START_KEYS)?.[1]);
  const end = toDate(pickAlias(input, VALIDITY_END_KEYS)?.[1]);
  if (start === undefined && end === undefined) return undefined;

  return {
    ...(start !== undefined && { start }),
    ...(end !== undefined && { end }),
  };
}

function normalizeConditions(input: unknown[]): RuleCondition[] {
  const conditions: RuleCondition[] = [];
  for (const condition of input) {
    if (!isObject(condition)) continue;
    const operator = condition['operator'];
    const field = condition['field'];
    if (typeof operator !== 'string' || !isConditionOperator(operator) || typeof field !== 'string') {
      continue;
    }

    const value = toJsonValue(condition['value']);
    const nameExt = stringOf(condition['name_ext'] ?? condition['nameExt']);
    conditions.push({
      operator,
      field,
      ...(value !== undefined && { value }),
      requireExt: toFlag(condition['require_ext'] ?? condition['requireExt'], false),
      ...(nameExt !== undefined && { nameExt }),
    });
  }
  return conditions;
}

function normalizeAction(input: Record<string, unknown>): RuleAction | undefined {
  const kind = stringOf(pickAlias(input, ACTION_KIND_KEYS)?.[1]);
  const field = stringOf(input['field']);
  if (kind === undefined || field === undefined) return undefined;

  return { field, kind: kind.toLowerCase(), ...normalizePayload(input) };
}

/** Fields shared by rule actions and query parameters. */
function normalizePayload(input: Record<string, unknown>): StrategyPayload {
  const value = toJsonValue(input['value']);
  const params = normalizeActionParams(input['params']);
  const nameExt = stringOf(input['name_ext'] ?? input['nameExt']);
  const requireExt = input['require_ext'] ?? input['requireExt'];

  return {
    ...(value !== undefined && { value }),
    ...(typeof input['query'] === 'string' && { query: input['query'] }),
    ...(params !== undefined && { params }),
    ...(Array.isArray(input['conditions']) && { conditions: normalizeConditions(input['conditions']) }),
    ...(requireExt !== undefined && { requireExt: toFlag(requireExt, false) }),
    ...(nameExt !== undefined && { nameExt }),
  };
}

function normalizeActionParams(input: unknown): ActionParams | undefined {
  if (!isObject(input)) return undefined;
  const startTime = stringOf(input['start_time'] ?? input['startTime']);
  const endTime = stringOf(input['end_time'] ?? input['endTime']);
  const fieldName = stringOf(input['field_name'] ?? input['fieldName']);

  return {
    ...(startTime !== undefined && { startTime }),
    ...(endTime !== undefined && { endTime }),
    ...(fieldName !== undefined && { fieldName }),
  };
}

function normalizeQueries(config: unknown): Partial<Record<QueryKind, QueryConfig>> {
  const queries: Partial<Record<QueryKind, QueryConfig>> = {};
  if (!isObject(config) || !isObject(config['db'])) return queries;

  const querys = config['db']['querys'];
  if (!isObject(querys)) return queries;

  for (const [kind, query] of Object.entries(querys)) {
    if (!isQueryKind(kind) || !isObject(query) || typeof query['query'] !== 'string') continue;
    queries[kind] = { query: query['query'], params: normalizeParameters(query['params']) };
  }
  return queries;
}

/** Parameters ordered by numeric index. */
export function normalizeParameters(input: unknown): ParameterSpec[] {
  const specs: ParameterSpec[] = [];

  for (const [key, spec] of parameterEntries(input) ?? []) {
    const index = Number(key);
    if (!Number.isInteger(index) || index < 0 || !isObject(spec)) continue;

    const type = stringOf(spec['type']) ?? 'parameter';
    if (!isParameterType(type)) continue;

    specs.push({
      ...normalizePayload(spec),
      index,
      placeholder: stringOf(spec['placeholder']) ?? '',
      type,
      requires: (stringOf(spec['requires']) ?? '').toLowerCase(),
    });
  }

  return specs.sort((a, b) => a.index - b.index);
}

function stringOf(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function toFlag(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
  }
  return fallback;
}

function toDate(value: unknown): Date | undefined {
  if (typeof value !== 'string') return undefined;
  const time = Date.parse(value);
  return Number.isNaN(time) ? undefined : new Date(time);
}
