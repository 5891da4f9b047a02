import type { StrategyPayload } from './action.js';

export type ParameterType = 'structural' | 'parameter';

/** Parametr SQL šablony */
export interface ParameterSpec extends StrategyPayload {
  index: number;
  placeholder: string;      // Text dosazený do šablony (např. "%s" nebo název tabulky)
  type: ParameterType;
  requires: string;         // Název strategie
}

export type QueryKind = 'save' | 'find' | 'find_tidnid';

/** Šablona dotazu s parametry seřazenými podle indexu */
export interface QueryConfig {
  query: string;            // "INSERT INTO {0} ... VALUES ({1}, {2})"
  params: ParameterSpec[];
}

/** Jak naložit s nevyřešenými parametry */
export type ExtractionMode = 'save' | 'find';
