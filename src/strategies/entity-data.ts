import type { JsonValue } from '../types/json.js';
import type { StrategyPayload } from '../types/action.js';
import type { ActionStrategy, StrategyContext, StrategyResult } from './types.js';

/**
 * Reads the entity payload (`id_service`, `timestamp`, `service`, `rules`).
 * Without `value` the whole payload is serialised to a JSON string.
 */
export class EntityDataStrategy implements ActionStrategy {
  readonly name = 'entity_data';

  execute(
    payload: StrategyPayload,
    _event: JsonValue,
    field: string,
    context: StrategyContext,
  ): StrategyResult {
    if (context.entity === undefined) {
      return {};
    }

    const data: Record<string, JsonValue> = context.entity.toJSON().data;
    if (typeof payload.value !== 'string' || payload.value === '') {
      return { [field]: JSON.stringify(data) };
    }

    const value = data[payload.value];
    return value === undefined || value === null ? {} : { [field]: value };
  }
}
