import type { JsonValue } from '../types/json.js';
import type { StrategyPayload } from '../types/action.js';
import type { QueryFn } from '../utils/json-query.js';
import { searchJson } from '../utils/json-query.js';
import { unflatten } from '../utils/flatten.js';
import { formatTemplate } from '../utils/interpolation.js';
import { PathResolver } from '../utils/path-resolver.js';
import type { ActionStrategy, StrategyContext, StrategyResult } from './types.js';

/**
 * Runs a JMESPath query.
 *
 * Plain mode queries the re-nested event. Extension mode reads the event
 * value at the first condition's field, substitutes it for `{0}` and
 * queries the auxiliary dataset named by `nameExt` instead:
 *
 * ```yaml
 * conditions:
 *   - { operator: exists, field: order.country, require_ext: true, name_ext: countries }
 * actions:
 *   - field: region
 *     action: extract_value
 *     query: "[?code=='{0}'].region | [0]"
 * ```
 */
export class ExtractValueStrategy implements ActionStrategy {
  readonly name = 'extract_value';

  constructor(
    private readonly search: QueryFn = searchJson,
    private readonly resolver = new PathResolver(),
  ) {}

  execute(
    payload: StrategyPayload,
    event: JsonValue,
    field: string,
    context: StrategyContext,
  ): StrategyResult {
    const query = payload.query;
    if (query === undefined || query === '') {
      return {};
    }

    const nested = unflatten(event);
    const reference = payload.conditions?.[0];
    const requireExt = payload.requireExt === true || reference?.requireExt === true;

    let result: JsonValue;
    if (requireExt && context.extensions !== undefined) {
      const nameExt = payload.nameExt ?? reference?.nameExt;
      const dataset = nameExt !== undefined ? context.extensions[nameExt] ?? [] : [];
      const key = reference !== undefined ? this.resolver.get(reference.field, nested) : undefined;
      const formatted = key === undefined || key === null
        ? query
        : formatTemplate(query, (index) => (index === 0 ? stringifyKey(key) : undefined));
      result = this.search(dataset, formatted);
    } else {
      result = this.search(nested, query);
    }

    return result === null ? {} : { [field]: result };
  }
}

function stringifyKey(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}
