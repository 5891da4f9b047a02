import type { RuleAction } from '../types/action.js';
import type { RuleCondition } from '../types/condition.js';
import type { JsonObject, JsonValue } from '../types/json.js';
import { StrategyExecutionError } from '../errors/index.js';
import type { StrategyContext } from '../strategies/types.js';
import type { StrategyRegistry } from '../strategies/registry.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

/** Outcome of a single action, for tracing. */
export interface ActionResult {
  action: RuleAction;
  success: boolean;
  output?: JsonObject;
  error?: string;
}

/**
 * Spouštění akcí pravidla přes registr strategií.
 *
 * Neznámá strategie i výjimka ve strategii znamenají, že akce nic
 * nepřispěje. Výstupy akcí jednoho pravidla se slučují v pořadí, pozdější
 * akce přepisuje dřívější.
 */
export class ActionExecutor {
  constructor(
    private readonly registry: StrategyRegistry,
    private readonly logger: Logger = silentLogger
  ) {}

  execute(
    actions: readonly RuleAction[],
    event: JsonValue,
    context: StrategyContext,
    ruleConditions: readonly RuleCondition[] = []
  ): ActionResult[] {
    return actions.map((action) => this.executeAction(action, event, context, ruleConditions));
  }

  /** Merged output of all actions. */
  apply(
    actions: readonly RuleAction[],
    event: JsonValue,
    context: StrategyContext,
    ruleConditions: readonly RuleCondition[] = []
  ): JsonObject {
    const output: JsonObject = {};
    for (const result of this.execute(actions, event, context, ruleConditions)) {
      if (result.output !== undefined) {
        Object.assign(output, result.output);
      }
    }
    return output;
  }

  private executeAction(
    action: RuleAction,
    event: JsonValue,
    context: StrategyContext,
    ruleConditions: readonly RuleCondition[]
  ): ActionResult {
    const strategy = this.registry.create(action.kind);
    if (strategy === undefined) {
      return { action, success: false, error: `Unsupported strategy: ${action.kind}` };
    }

    const payload = action.conditions === undefined && ruleConditions.length > 0
      ? { ...action, conditions: [...ruleConditions] }
      : action;

    try {
      const output = strategy.execute(payload, event, action.field, context);
      return { action, success: true, output };
    } catch (err) {
      const error = new StrategyExecutionError(action.kind, action.field, err);
      this.logger.error({ err: error, field: action.field }, error.message);
      return { action, success: false, error: error.message };
    }
  }
}
