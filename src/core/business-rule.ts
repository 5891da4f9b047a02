import type { Rule } from '../types/rule.js';
import type { JsonObject, JsonValue } from '../types/json.js';
import type { StrategyContext } from '../strategies/types.js';
import type { ConditionEvaluator, EvaluationOptions } from '../evaluation/condition-evaluator.js';
import type { ActionExecutor, ActionResult } from '../evaluation/action-executor.js';

/**
 * Jedno pravidlo: období platnosti, podmínky (AND) a akce.
 */
export class BusinessRule {
  constructor(
    readonly rule: Rule,
    private readonly conditions: ConditionEvaluator,
    private readonly actions: ActionExecutor
  ) {}

  get id(): string {
    return this.rule.id;
  }

  get priority(): number {
    return this.rule.priority;
  }

  /** Both bounds are inclusive; a missing bound is open. */
  isWithinValidity(now: Date): boolean {
    const period = this.rule.validityPeriod;
    if (period === undefined) return true;

    const time = now.getTime();
    if (period.start !== undefined && time < period.start.getTime()) return false;
    if (period.end !== undefined && time > period.end.getTime()) return false;
    return true;
  }

  isApplicable(event: JsonValue, now: Date, options?: EvaluationOptions): boolean {
    if (!this.isWithinValidity(now)) {
      return false;
    }
    return this.conditions.evaluateAll(this.rule.conditions, event, options);
  }

  apply(event: JsonValue, context: StrategyContext): JsonObject {
    return this.actions.apply(this.rule.actions, event, context, this.rule.conditions);
  }

  run(event: JsonValue, context: StrategyContext): ActionResult[] {
    return this.actions.execute(this.rule.actions, event, context, this.rule.conditions);
  }
}
