/**
 * Action validation.
 *
 * @module
 */

import { STRATEGY_NAMES, isStrategyName } from '../constants.js';
import type { IssueCollector } from '../types.js';
import { isObject, hasProperty, isBooleanFlag, pickAlias } from '../types.js';
import { validateConditions } from './condition.js';

export const ACTION_KIND_KEYS = ['kind', 'action', 'calculate'] as const;

export function validateActions(
  actions: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (!Array.isArray(actions)) {
    collector.addError(path, 'Actions must be an array');
    return;
  }

  if (actions.length === 0) {
    collector.addWarning(path, 'Rule has no actions');
  }

  for (let i = 0; i < actions.length; i++) {
    validateAction(actions[i], `${path}[${i}]`, collector);
  }
}

export function validateAction(
  action: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (!isObject(action)) {
    collector.addError(path, 'Action must be an object');
    return;
  }

  const field = action['field'];
  if (typeof field !== 'string' || field.trim() === '') {
    collector.addError(`${path}.field`, 'Action must have a non-empty "field"');
  }

  const kindEntry = pickAlias(action, ACTION_KIND_KEYS);
  if (kindEntry === undefined) {
    collector.addError(`${path}.kind`, 'Action must have a "kind", "action" or "calculate" field');
    return;
  }

  const [kindKey, kind] = kindEntry;
  if (typeof kind !== 'string') {
    collector.addError(`${path}.${kindKey}`, 'Action kind must be a string');
    return;
  }
  if (!isStrategyName(kind)) {
    collector.addWarning(
      `${path}.${kindKey}`,
      `Unknown strategy: ${kind}. Known strategies: ${STRATEGY_NAMES.join(', ')}`,
    );
  }

  validatePayload(kind.toLowerCase(), action, path, collector);
}

function validatePayload(
  kind: string,
  action: Record<string, unknown>,
  path: string,
  collector: IssueCollector,
): void {
  switch (kind) {
    case 'set_fixed_value':
      if (!hasProperty(action, 'value')) {
        collector.addError(`${path}.value`, 'set_fixed_value requires a "value"');
      }
      break;

    case 'set_value':
    case 'event_field':
      if (typeof action['value'] !== 'string' || action['value'] === '') {
        collector.addError(`${path}.value`, `${kind} requires the source field name in "value"`);
      }
      break;

    case 'extract_value':
      if (typeof action['query'] !== 'string' || action['query'] === '') {
        collector.addError(`${path}.query`, 'extract_value requires a "query"');
      }
      break;

    case 'time_difference': {
      const params = action['params'];
      if (!isObject(params)) {
        collector.addError(`${path}.params`, 'time_difference requires "params" with start_time and end_time');
        break;
      }
      for (const key of ['start_time', 'end_time']) {
        if (typeof params[key] !== 'string') {
          collector.addError(`${path}.params.${key}`, `time_difference requires "params.${key}"`);
        }
      }
      break;
    }
  }

  if (hasProperty(action, 'require_ext') && !isBooleanFlag(action['require_ext'])) {
    collector.addError(`${path}.require_ext`, 'require_ext must be true or false');
  }

  if (hasProperty(action, 'conditions')) {
    validateConditions(action['conditions'], `${path}.conditions`, collector);
  }
}
