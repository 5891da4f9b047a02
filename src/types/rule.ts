import type { RuleCondition } from './condition.js';
import type { RuleAction } from './action.js';

/** Období platnosti (ISO-8601 UTC, obě meze volitelné) */
export interface ValidityPeriod {
  start?: Date;
  end?: Date;
}

/** Obchodní pravidlo */
export interface Rule {
  id: string;
  eventType: string;        // idService, pro který pravidlo platí
  description?: string;
  priority: number;         // Vyšší = dříve
  validityPeriod?: ValidityPeriod;

  // Podmínky (všechny musí platit)
  conditions: RuleCondition[];

  // Akce při splnění
  actions: RuleAction[];
}

/**
 * Jak se slučují výstupy více pravidel, která zapisují stejné pole.
 * - `overwrite`: pozdější pravidlo (nižší priorita) přepíše dřívější
 * - `first_wins`: ponechá se hodnota z prvního pravidla
 */
export type MergePolicy = 'overwrite' | 'first_wins';
