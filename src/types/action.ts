import type { JsonValue } from './json.js';
import type { RuleCondition } from './condition.js';

/** Názvy registrovaných strategií */
export type StrategyName =
  | 'set_fixed_value'
  | 'set_value'
  | 'event_field'
  | 'extract_value'
  | 'datetime_now'
  | 'entity_data'
  | 'context_value'
  | 'time_difference';

/** Parametry pro výpočetní akce (time_difference) */
export interface ActionParams {
  startTime?: string;
  endTime?: string;
  fieldName?: string;
}

/**
 * Payload, který dostane strategie. Sdílí ho akce pravidel
 * i parametry SQL dotazů.
 */
export interface StrategyPayload {
  value?: JsonValue;
  query?: string;
  params?: ActionParams;
  conditions?: RuleCondition[];
  requireExt?: boolean;
  nameExt?: string;
}

/** Akce pravidla - výsledek se zapíše do `field` */
export interface RuleAction extends StrategyPayload {
  field: string;
  kind: string;                                // Název strategie (neznámé se přeskočí)
}
