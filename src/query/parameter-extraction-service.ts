import type { JsonValue } from '../types/json.js';
import type { ExtractionMode, ParameterSpec } from '../types/parameter.js';
import { StrategyExecutionError } from '../errors/index.js';
import type { ExtractionContext } from '../core/extraction-context.js';
import { getSharedRegistry } from '../strategies/registry.js';
import type { StrategyRegistry } from '../strategies/registry.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

/** Value bound to a query placeholder. Objects and arrays are sent as JSON text. */
export type SqlValue = string | number | boolean | null;

export interface ParameterExtractionOptions {
  registry?: StrategyRegistry;
  logger?: Logger;
}

/** Parameter specs ordered by index. */
export function orderParameters(params: readonly ParameterSpec[]): ParameterSpec[] {
  return [...params].sort((a, b) => a.index - b.index);
}

export function toSqlValue(value: JsonValue | undefined): SqlValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'object') return JSON.stringify(value);
  return value;
}

/**
 * Resolves the `parameter` entries of a query config into the ordered value
 * tuple bound to the query. Structural entries are skipped here; they are
 * substituted into the query text by the builder.
 */
export class ParameterExtractionService {
  private readonly registry: StrategyRegistry;
  private readonly logger: Logger;

  constructor(options: ParameterExtractionOptions = {}) {
    this.registry = options.registry ?? getSharedRegistry();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * `save` keeps one value per parameter entry (null when unresolved);
   * `find` drops unresolved values at the end of the tuple.
   */
  extract(
    params: readonly ParameterSpec[],
    context: ExtractionContext,
    mode: ExtractionMode = 'save',
  ): SqlValue[] {
    const values: SqlValue[] = [];

    for (const spec of orderParameters(params)) {
      if (spec.type === 'structural') {
        continue;
      }
      const value = this.extractOne(spec, context);
      this.logger.debug({ index: spec.index, placeholder: spec.placeholder, value }, 'Parameter extracted');
      values.push(value);
    }

    if (mode === 'find') {
      while (values.length > 0 && values[values.length - 1] === null) {
        values.pop();
      }
    }

    return values;
  }

  private extractOne(spec: ParameterSpec, context: ExtractionContext): SqlValue {
    const strategy = this.registry.create(spec.requires);
    if (strategy === undefined) {
      return null;
    }

    try {
      const result = strategy.execute(spec, context.event, spec.placeholder, {
        entity: context.entity,
        extraction: context,
      });
      return toSqlValue(result[spec.placeholder]);
    } catch (err) {
      const error = new StrategyExecutionError(spec.requires, spec.placeholder, err);
      this.logger.error({ err: error, index: spec.index }, error.message);
      return null;
    }
  }
}
