/**
 * Rule validation.
 *
 * @module
 */

import { isIsoTimestamp } from '../constants.js';
import type { IssueCollector } from '../types.js';
import { isObject, hasProperty, pickAlias } from '../types.js';
import { validateConditions } from './condition.js';
import { validateActions } from './action.js';

export const RULE_ID_KEYS = ['id_rule', 'id'] as const;
export const EVENT_TYPE_KEYS = ['event_type', 'eventType'] as const;
export const VALIDITY_PERIOD_KEYS = ['validity_period', 'validityPeriod'] as const;
export const VALIDITY_START_KEYS = ['start_date', 'start'] as const;
export const VALIDITY_END_KEYS = ['end_date', 'end'] as const;

export function validateRules(
  rules: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (!Array.isArray(rules)) {
    collector.addError(path, 'Rules must be an array');
    return;
  }

  const ids = new Set<string>();
  for (let i = 0; i < rules.length; i++) {
    const rule: unknown = rules[i];
    const prefix = `${path}[${i}]`;
    validateRule(rule, prefix, collector);

    if (isObject(rule)) {
      const id = pickAlias(rule, RULE_ID_KEYS)?.[1];
      if (typeof id === 'string') {
        if (ids.has(id)) {
          collector.addWarning(`${prefix}.id_rule`, `Duplicate rule ID: ${id}`);
        }
        ids.add(id);
      }
    }
  }
}

export function validateRule(
  rule: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (!isObject(rule)) {
    collector.addError(path, 'Rule must be an object');
    return;
  }

  const id = pickAlias(rule, RULE_ID_KEYS);
  if (id === undefined) {
    collector.addError(`${path}.id_rule`, 'Required field "id_rule" is missing');
  } else if (typeof id[1] !== 'string' || id[1].trim() === '') {
    collector.addError(`${path}.${id[0]}`, `Field "${id[0]}" must be a non-empty string`);
  }

  const eventType = pickAlias(rule, EVENT_TYPE_KEYS);
  if (eventType === undefined) {
    collector.addError(`${path}.event_type`, 'Required field "event_type" is missing');
  } else if (typeof eventType[1] !== 'string' || eventType[1].trim() === '') {
    collector.addError(`${path}.${eventType[0]}`, `Field "${eventType[0]}" must be a non-empty string`);
  }

  if (hasProperty(rule, 'description') && typeof rule['description'] !== 'string') {
    collector.addError(`${path}.description`, 'Field "description" must be a string');
  }

  if (hasProperty(rule, 'priority')) {
    const priority = rule['priority'];
    if (typeof priority !== 'number') {
      collector.addError(`${path}.priority`, 'Field "priority" must be a number');
    } else if (!Number.isInteger(priority)) {
      collector.addWarning(`${path}.priority`, 'Field "priority" should be an integer');
    }
  }

  const validity = pickAlias(rule, VALIDITY_PERIOD_KEYS);
  if (validity !== undefined) {
    validateValidityPeriod(validity[1], `${path}.${validity[0]}`, collector);
  }

  if (hasProperty(rule, 'conditions')) {
    validateConditions(rule['conditions'], `${path}.conditions`, collector);
  }

  if (!hasProperty(rule, 'actions')) {
    collector.addError(`${path}.actions`, 'Required field "actions" is missing');
  } else {
    validateActions(rule['actions'], `${path}.actions`, collector);
  }
}

function validateValidityPeriod(
  period: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (period === null) return;
  if (!isObject(period)) {
    collector.addError(path, 'validity_period must be an object');
    return;
  }

  const start = pickAlias(period, VALIDITY_START_KEYS);
  const end = pickAlias(period, VALIDITY_END_KEYS);
  for (const bound of [start, end]) {
    if (bound === undefined || bound[1] === null) continue;
    const [key, value] = bound;
    if (!isIsoTimestamp(value)) {
      collector.addError(`${path}.${key}`, `${key} must be an ISO-8601 timestamp such as 2024-01-01T00:00:00Z`);
    }
  }

  const startValue = start?.[1];
  const endValue = end?.[1];
  if (isIsoTimestamp(startValue) && isIsoTimestamp(endValue)
    && Date.parse(startValue) > Date.parse(endValue)) {
    collector.addWarning(path, 'validity_period starts after it ends; the rule never applies');
  }
}
