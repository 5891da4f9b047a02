import type { JsonValue } from '../types/json.js';
import type { StrategyPayload } from '../types/action.js';
import { parseTimestamp } from '../utils/date-format.js';
import { PathResolver } from '../utils/path-resolver.js';
import { readEventValue } from './set-value.js';
import type { ActionStrategy, StrategyResult } from './types.js';

/**
 * Seconds between two event timestamps. `params.startTime` and
 * `params.endTime` name the fields, optionally prefixed with `$`.
 */
export class TimeDifferenceStrategy implements ActionStrategy {
  readonly name = 'time_difference';

  constructor(private readonly resolver = new PathResolver()) {}

  execute(payload: StrategyPayload, event: JsonValue, field: string): StrategyResult {
    const startField = payload.params?.startTime;
    const endField = payload.params?.endTime;
    if (startField === undefined || endField === undefined) {
      return {};
    }

    const start = parseTimestamp(readEventValue(this.resolver, stripReference(startField), event));
    const end = parseTimestamp(readEventValue(this.resolver, stripReference(endField), event));
    if (start === undefined || end === undefined) {
      return {};
    }

    return { [field]: (end.getTime() - start.getTime()) / 1000 };
  }
}

function stripReference(name: string): string {
  return name.replace(/^\$+/, '');
}
