/**
 * Configuration validation module.
 *
 * @module
 */

// Types
export type { ValidationIssue, ValidationResult } from './types.js';

// Constants
export {
  CONDITION_OPERATORS,
  STRATEGY_NAMES,
  QUERY_KINDS,
  PARAMETER_TYPES,
  MERGE_POLICIES,
  STRUCTURAL_PLACEHOLDERS,
  isConditionOperator,
  isStrategyName,
  isQueryKind,
  isParameterType,
  isMergePolicy,
} from './constants.js';

// Validator
export { ConfigValidator } from './config-validator.js';
