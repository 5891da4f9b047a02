import type { JsonValue } from './json.js';

export type ConditionOperator =
  | 'exists'                                   // Pole existuje
  | 'matches_query'                            // Výsledek dotazu je truthy
  | 'equals' | 'not_equals'                    // Rovnost
  | 'in'                                       // Hodnota je v seznamu
  | 'contains'                                 // Seznam/řetězec obsahuje hodnotu
  | 'greater_than' | 'less_than';              // Porovnání

/** Podmínka pravidla */
export interface RuleCondition {
  operator: ConditionOperator;
  field: string;                               // Tečková cesta v eventu
  value?: JsonValue;                           // Literál pro porovnání
  requireExt: boolean;                         // Hodnota pole parametrizuje dotaz nad rozšířením
  nameExt?: string;                            // Název rozšíření (pomocného datasetu)
}
