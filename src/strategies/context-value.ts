import type { JsonValue } from '../types/json.js';
import type { StrategyPayload } from '../types/action.js';
import type { ActionStrategy, StrategyContext, StrategyResult } from './types.js';

/** Key that resolves to the entity name currently being persisted. */
export const ENTITY_NAME_KEY = 'entity_name';

/** Reads the caller-supplied context map. */
export class ContextValueStrategy implements ActionStrategy {
  readonly name = 'context_value';

  execute(
    payload: StrategyPayload,
    _event: JsonValue,
    field: string,
    context: StrategyContext,
  ): StrategyResult {
    const key = payload.value;
    if (typeof key !== 'string' || key === '' || context.extraction === undefined) {
      return {};
    }

    const value = key === ENTITY_NAME_KEY
      ? context.extraction.getEntityName()
      : context.extraction.getContextValue(key);

    return value === undefined || value === null ? {} : { [field]: value };
  }
}
