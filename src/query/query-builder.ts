import type { ExtractionMode, ParameterSpec, QueryConfig, QueryKind } from '../types/parameter.js';
import { ConfigurationError } from '../errors/index.js';
import { isQueryKind } from '../validation/constants.js';
import type { ExtractionContext } from '../core/extraction-context.js';
import { formatTemplate } from '../utils/interpolation.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { SqlValue } from './parameter-extraction-service.js';
import { ParameterExtractionService } from './parameter-extraction-service.js';

/** Formatted query text and the values bound to its placeholders. */
export interface BuiltQuery {
  query: string;
  params: SqlValue[];
}

export interface QueryBuilderOptions {
  extraction?: ParameterExtractionService;
  logger?: Logger;
}

/**
 * Base for query builders. Subclasses differ only in how unresolved
 * parameters are treated.
 */
export abstract class QueryBuilder {
  protected abstract readonly mode: ExtractionMode;
  protected readonly extraction: ParameterExtractionService;
  protected readonly logger: Logger;

  constructor(options: QueryBuilderOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.extraction = options.extraction ?? new ParameterExtractionService({ logger: this.logger });
  }

  build(config: QueryConfig, context: ExtractionContext): BuiltQuery {
    const query = this.formatQuery(config.query, config.params, context);
    const params = this.extraction.extract(config.params, context, this.mode);
    this.logger.debug({ template: config.query, query, params }, 'Query built');
    return { query, params };
  }

  /**
   * Substitutes `{n}`: structural entries by their resolved value, parameter
   * entries by their placeholder text. An index with no entry becomes
   * `placeholder_<n>`.
   */
  formatQuery(template: string, params: readonly ParameterSpec[], context: ExtractionContext): string {
    const replacements = new Map<number, string>();
    for (const spec of params) {
      replacements.set(
        spec.index,
        spec.type === 'structural' ? this.resolveStructural(spec.placeholder, context) : spec.placeholder,
      );
    }

    return formatTemplate(template, (index) => {
      if (index >= params.length) return undefined;
      return replacements.get(index) ?? `placeholder_${index}`;
    });
  }

  protected resolveStructural(name: string, context: ExtractionContext): string {
    switch (name) {
      case 'entity_names':
        return context.getEntityName() ?? 'default_entity';
      case 'table_name':
        return contextString(context, 'table_name') ?? 'default_table';
      case 'schema_name':
        return contextString(context, 'schema_name') ?? 'public';
      default:
        this.logger.warn({ placeholder: name }, 'No resolver for structural placeholder');
        return name;
    }
  }
}

function contextString(context: ExtractionContext, key: string): string | undefined {
  const value = context.getContextValue(key);
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/** INSERT-style queries: every declared parameter is bound, unresolved ones as null. */
export class SaveQueryBuilder extends QueryBuilder {
  protected readonly mode = 'save';
}

/** Lookups: unresolved trailing parameters are left out. */
export class FindQueryBuilder extends QueryBuilder {
  protected readonly mode = 'find';
}

export class QueryBuilderFactory {
  private readonly builders: Record<QueryKind, QueryBuilder>;

  constructor(options: QueryBuilderOptions = {}) {
    const find = new FindQueryBuilder(options);
    this.builders = {
      save: new SaveQueryBuilder(options),
      find,
      find_tidnid: find,
    };
  }

  create(kind: string): QueryBuilder {
    const builder = isQueryKind(kind) ? this.builders[kind] : undefined;
    if (builder === undefined) {
      throw new ConfigurationError(`Unsupported query kind: ${kind}`);
    }
    return builder;
  }
}
