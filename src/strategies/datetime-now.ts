import type { JsonValue } from '../types/json.js';
import type { StrategyPayload } from '../types/action.js';
import { DEFAULT_DATE_FORMAT, formatDate } from '../utils/date-format.js';
import type { ActionStrategy, StrategyResult } from './types.js';

/** Current UTC instant formatted by `value` (default `YYYYMMDD`). */
export class DatetimeNowStrategy implements ActionStrategy {
  readonly name = 'datetime_now';

  constructor(private readonly now: () => Date = () => new Date()) {}

  execute(payload: StrategyPayload, _event: JsonValue, field: string): StrategyResult {
    const pattern = typeof payload.value === 'string' && payload.value !== ''
      ? payload.value
      : DEFAULT_DATE_FORMAT;
    return { [field]: formatDate(this.now(), pattern) };
  }
}
