import type { MergePolicy, Rule } from '../types/rule.js';
import type { JsonObject, JsonValue } from '../types/json.js';
import { ConditionEvaluator } from '../evaluation/condition-evaluator.js';
import type { ConditionEvaluationResult } from '../evaluation/condition-evaluator.js';
import { ActionExecutor } from '../evaluation/action-executor.js';
import type { ActionResult } from '../evaluation/action-executor.js';
import { getSharedRegistry } from '../strategies/registry.js';
import type { StrategyRegistry } from '../strategies/registry.js';
import { unflatten } from '../utils/flatten.js';
import { PathResolver } from '../utils/path-resolver.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { BusinessRule } from './business-rule.js';

export interface RuleEngineOptions {
  registry?: StrategyRegistry;
  /** Auxiliary datasets for `extract_value` in extension mode. */
  extensions?: Readonly<Record<string, JsonValue>>;
  mergePolicy?: MergePolicy;
  resolver?: PathResolver;
  logger?: Logger;
}

/** Per-rule trace produced by {@link RuleEngine.evaluate}. */
export interface RuleEvaluation {
  ruleId: string;
  priority: number;
  withinValidity: boolean;
  applicable: boolean;
  conditions: ConditionEvaluationResult[];
  actions: ActionResult[];
}

/**
 * Vyhodnocuje pravidla jednoho typu eventu.
 *
 * Pravidla se procházejí podle priority sestupně (stabilně, shodná priorita
 * zachovává pořadí v konfiguraci). Výstupy použitelných pravidel se slučují
 * podle `mergePolicy`: při `overwrite` vyhrává poslední zapsaná hodnota, při
 * `first_wins` první.
 */
export class RuleEngine {
  private readonly rules: BusinessRule[];
  private readonly extensions: Readonly<Record<string, JsonValue>>;
  private readonly mergePolicy: MergePolicy;
  private readonly logger: Logger;

  constructor(rules: readonly Rule[], options: RuleEngineOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.extensions = options.extensions ?? {};
    this.mergePolicy = options.mergePolicy ?? 'overwrite';

    const resolver = options.resolver ?? new PathResolver({ logger: this.logger });
    const conditions = new ConditionEvaluator({ resolver, logger: this.logger });
    const actions = new ActionExecutor(options.registry ?? getSharedRegistry(), this.logger);

    this.rules = [...rules]
      .sort((a, b) => b.priority - a.priority)
      .map((rule) => new BusinessRule(rule, conditions, actions));
  }

  /** Rule ids in evaluation order. */
  get order(): string[] {
    return this.rules.map((rule) => rule.id);
  }

  processEvent(event: JsonValue, now: Date = new Date()): JsonObject {
    const nested = unflatten(event);
    const results: JsonObject = {};

    for (const rule of this.rules) {
      if (!rule.isApplicable(nested, now)) {
        continue;
      }
      const output = rule.apply(nested, { extensions: this.extensions });
      this.logger.debug({ ruleId: rule.id, fields: Object.keys(output) }, 'Rule applied');
      this.merge(results, output);
    }

    return results;
  }

  /** Same pass as {@link processEvent}, returning what each rule did. */
  evaluate(event: JsonValue, now: Date = new Date()): RuleEvaluation[] {
    const nested = unflatten(event);

    return this.rules.map((rule) => {
      const conditions: ConditionEvaluationResult[] = [];
      const withinValidity = rule.isWithinValidity(now);
      const applicable = withinValidity && rule.isApplicable(nested, now, {
        onConditionEvaluated: (result) => conditions.push(result),
      });

      return {
        ruleId: rule.id,
        priority: rule.priority,
        withinValidity,
        applicable,
        conditions,
        actions: applicable ? rule.run(nested, { extensions: this.extensions }) : [],
      };
    });
  }

  private merge(target: JsonObject, output: JsonObject): void {
    for (const [field, value] of Object.entries(output)) {
      if (this.mergePolicy === 'first_wins' && Object.hasOwn(target, field)) {
        continue;
      }
      target[field] = value;
    }
  }
}
