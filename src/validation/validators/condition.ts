/**
 * Condition validation.
 *
 * @module
 */

import { CONDITION_OPERATORS, isConditionOperator } from '../constants.js';
import type { IssueCollector } from '../types.js';
import { isObject, hasProperty, isBooleanFlag } from '../types.js';

export function validateConditions(
  conditions: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (!Array.isArray(conditions)) {
    collector.addError(path, 'Conditions must be an array');
    return;
  }

  for (let i = 0; i < conditions.length; i++) {
    validateCondition(conditions[i], `${path}[${i}]`, collector);
  }
}

export function validateCondition(
  condition: unknown,
  path: string,
  collector: IssueCollector,
): void {
  if (!isObject(condition)) {
    collector.addError(path, 'Condition must be an object');
    return;
  }

  const field = condition['field'];
  if (!hasProperty(condition, 'field')) {
    collector.addError(`${path}.field`, 'Condition must have a "field" field');
  } else if (typeof field !== 'string' || field.trim() === '') {
    collector.addError(`${path}.field`, 'Condition field must be a non-empty string');
  }

  const operator = condition['operator'];
  if (!hasProperty(condition, 'operator')) {
    collector.addError(`${path}.operator`, 'Condition must have an "operator" field');
  } else if (typeof operator !== 'string') {
    collector.addError(`${path}.operator`, 'Condition operator must be a string');
  } else if (!isConditionOperator(operator)) {
    collector.addError(
      `${path}.operator`,
      `Invalid operator: ${operator}. Valid operators: ${CONDITION_OPERATORS.join(', ')}`,
    );
  } else {
    validateOperand(operator, condition, path, collector);
  }

  if (hasProperty(condition, 'require_ext') && !isBooleanFlag(condition['require_ext'])) {
    collector.addError(`${path}.require_ext`, 'require_ext must be true or false');
  }

  if (hasProperty(condition, 'name_ext') && typeof condition['name_ext'] !== 'string') {
    collector.addError(`${path}.name_ext`, 'name_ext must be a string');
  }
}

function validateOperand(
  operator: string,
  condition: Record<string, unknown>,
  path: string,
  collector: IssueCollector,
): void {
  const value = condition['value'];

  switch (operator) {
    case 'exists':
    case 'matches_query':
      return;

    case 'in':
      if (!Array.isArray(value)) {
        collector.addError(`${path}.value`, 'Operator "in" requires an array value');
      }
      return;

    case 'greater_than':
    case 'less_than':
      if (typeof value !== 'number' && typeof value !== 'string') {
        collector.addError(`${path}.value`, `Operator "${operator}" requires a number or string value`);
      }
      return;

    default:
      if (!hasProperty(condition, 'value')) {
        collector.addWarning(`${path}.value`, `Operator "${operator}" without a value compares against null`);
      }
  }
}
