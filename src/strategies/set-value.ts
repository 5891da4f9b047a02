import type { JsonValue } from '../types/json.js';
import { isJsonObject } from '../types/json.js';
import type { StrategyName, StrategyPayload } from '../types/action.js';
import { PathResolver } from '../utils/path-resolver.js';
import type { ActionStrategy, StrategyResult } from './types.js';

/**
 * Copies a value out of the event. The configured `value` names the source
 * field: a literal key of a flattened event first, then a dotted path.
 *
 * Registered twice, as `set_value` for rule actions and as `event_field`
 * for query parameters.
 */
export class SetValueStrategy implements ActionStrategy {
  readonly name: StrategyName;
  private readonly resolver: PathResolver;

  constructor(name: 'set_value' | 'event_field' = 'set_value', resolver = new PathResolver()) {
    this.name = name;
    this.resolver = resolver;
  }

  execute(payload: StrategyPayload, event: JsonValue, field: string): StrategyResult {
    const source = payload.value;
    if (typeof source !== 'string' || source === '') {
      return {};
    }

    const value = readEventValue(this.resolver, source, event);
    if (value === undefined || value === null) {
      return {};
    }
    return { [field]: value };
  }
}

/** Literal key lookup, then path resolution. */
export function readEventValue(
  resolver: PathResolver,
  source: string,
  event: JsonValue,
): JsonValue | undefined {
  if (isJsonObject(event)) {
    const direct = Object.hasOwn(event, source) ? event[source] : undefined;
    if (direct !== undefined && direct !== null) {
      return direct;
    }
  }
  return resolver.get(source, event);
}
