import type { RuleCondition } from '../types/condition.js';
import type { JsonValue } from '../types/json.js';
import { evaluateCondition } from '../utils/operators.js';
import { PathResolver } from '../utils/path-resolver.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

/** Trace record for one evaluated condition. */
export interface ConditionEvaluationResult {
  conditionIndex: number;
  field: string;
  operator: RuleCondition['operator'];
  actualValue: JsonValue | undefined;
  expectedValue: JsonValue | undefined;
  result: boolean;
  error?: string;
}

export type ConditionEvaluationCallback = (result: ConditionEvaluationResult) => void;

/** Options for condition evaluation with optional tracing */
export interface EvaluationOptions {
  /** Callback invoked after each condition evaluation */
  onConditionEvaluated?: ConditionEvaluationCallback;
}

export interface ConditionEvaluatorOptions {
  resolver?: PathResolver;
  logger?: Logger;
}

/**
 * Vyhodnocuje podmínky pravidel nad eventem.
 */
export class ConditionEvaluator {
  private readonly resolver: PathResolver;
  private readonly logger: Logger;

  constructor(options: ConditionEvaluatorOptions = {}) {
    this.resolver = options.resolver ?? new PathResolver();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Vyhodnotí všechny podmínky (AND logika).
   */
  evaluateAll(
    conditions: readonly RuleCondition[],
    event: JsonValue,
    options?: EvaluationOptions
  ): boolean {
    for (const [index, condition] of conditions.entries()) {
      if (!this.evaluate(condition, event, index, options)) {
        return false;
      }
    }
    return true;
  }

  /**
   * Vyhodnotí jednu podmínku. Chyba při vyhodnocení znamená false.
   */
  evaluate(
    condition: RuleCondition,
    event: JsonValue,
    conditionIndex = 0,
    options?: EvaluationOptions
  ): boolean {
    let actualValue: JsonValue | undefined;
    let result = false;
    let error: string | undefined;

    try {
      const resolved = this.resolver.resolve(condition.field, event);
      actualValue = resolved.status === 'found' ? resolved.value : undefined;
      result = evaluateCondition(condition, resolved);
    } catch (err) {
      error = err instanceof Error ? err.message : String(err);
      this.logger.error({ err, field: condition.field, operator: condition.operator }, 'Condition evaluation failed');
    }

    options?.onConditionEvaluated?.({
      conditionIndex,
      field: condition.field,
      operator: condition.operator,
      actualValue,
      expectedValue: condition.value,
      result,
      ...(error !== undefined && { error }),
    });

    return result;
  }
}
