import type { JsonValue } from '../types/json.js';
import type { StrategyName, StrategyPayload } from '../types/action.js';
import type { Entity } from '../core/entity.js';
import type { ExtractionContext } from '../core/extraction-context.js';

/** `{ [outputField]: value }`; empty means the strategy contributes nothing. */
export type StrategyResult = Record<string, JsonValue>;

/**
 * What a strategy may read besides the event. Rule actions receive the
 * auxiliary datasets, query parameters receive the entity and the
 * extraction context.
 */
export interface StrategyContext {
  extensions?: Readonly<Record<string, JsonValue>>;
  entity?: Entity;
  extraction?: ExtractionContext;
}

export interface ActionStrategy {
  readonly name: StrategyName;
  execute(
    payload: StrategyPayload,
    event: JsonValue,
    field: string,
    context: StrategyContext,
  ): StrategyResult;
}
