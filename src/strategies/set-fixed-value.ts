import type { JsonValue } from '../types/json.js';
import type { StrategyPayload } from '../types/action.js';
import type { ActionStrategy, StrategyResult } from './types.js';

/** Writes the configured literal. */
export class SetFixedValueStrategy implements ActionStrategy {
  readonly name = 'set_fixed_value';

  execute(payload: StrategyPayload, _event: JsonValue, field: string): StrategyResult {
    if (payload.value === undefined) {
      return {};
    }
    return { [field]: payload.value };
  }
}
