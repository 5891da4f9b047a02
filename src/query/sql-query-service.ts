import type { QueryConfig, QueryKind } from '../types/parameter.js';
import { ConfigurationError } from '../errors/index.js';
import type { ExtractionContext } from '../core/extraction-context.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { BuiltQuery, QueryBuilderOptions } from './query-builder.js';
import { QueryBuilderFactory } from './query-builder.js';
import { QUERY_KINDS } from '../validation/constants.js';

export interface SqlQueryServiceOptions extends QueryBuilderOptions {
  factory?: QueryBuilderFactory;
}

/**
 * Builds a consumer's configured queries for one event.
 */
export class SqlQueryService {
  private readonly factory: QueryBuilderFactory;
  private readonly logger: Logger;

  constructor(options: SqlQueryServiceOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.factory = options.factory ?? new QueryBuilderFactory(options);
  }

  build(kind: QueryKind, context: ExtractionContext): BuiltQuery {
    const config = this.requireConfig(kind, context);
    const built = this.factory.create(kind).build(config, context);
    this.logger.debug({ kind, query: built.query, params: built.params }, 'SQL query built');
    return built;
  }

  hasQuery(kind: QueryKind, context: ExtractionContext): boolean {
    return context.getQueryConfig(kind) !== undefined;
  }

  availableKinds(context: ExtractionContext): QueryKind[] {
    const queries = context.getConsumer()?.queries;
    return QUERY_KINDS.filter((kind) => queries?.[kind] !== undefined);
  }

  private requireConfig(kind: QueryKind, context: ExtractionContext): QueryConfig {
    const consumerId = context.getAppConsumerId() ?? '(unknown)';
    const consumer = context.getConsumer();
    if (consumer === undefined) {
      throw new ConfigurationError(`No configuration for appConsumer='${consumerId}'`);
    }

    const config = consumer.queries[kind];
    if (config === undefined) {
      throw new ConfigurationError(`No '${kind}' query for appConsumer='${consumerId}'`);
    }
    if (config.query.trim() === '') {
      throw new ConfigurationError(`Query '${kind}' has no SQL text for appConsumer='${consumerId}'`);
    }
    if (config.params.length === 0) {
      throw new ConfigurationError(`Query '${kind}' has no parameters for appConsumer='${consumerId}'`);
    }
    return config;
  }
}
