import type { JsonValue } from '../types/json.js';
import { RepositoryError, RulepathError, errorMessage } from '../errors/index.js';
import type { Entity } from '../core/entity.js';
import type { ExtractionContext } from '../core/extraction-context.js';
import type { SqlQueryService } from '../query/sql-query-service.js';
import type { BuiltQuery } from '../query/query-builder.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { PersistenceGateway, Row } from './gateway.js';

/**
 * Entity persistence through the consumer's configured queries.
 *
 * Configuration problems surface as they are thrown by the query service;
 * gateway failures are wrapped in {@link RepositoryError}.
 */
export class EntityRepository {
  constructor(
    private readonly gateway: PersistenceGateway,
    private readonly queries: SqlQueryService,
    private readonly logger: Logger = silentLogger,
  ) {}

  /** Saves the entity under the context's entity name. */
  async save(entity: Entity, context: ExtractionContext): Promise<boolean> {
    const bound = context.with({ entity });
    const built = this.queries.build('save', bound);
    const saved = await this.run('save', built, () => this.gateway.execute(built.query, built.params));
    this.logger.info(
      { entityName: bound.getEntityName(), sessionId: entity.sessionId },
      'Entity saved',
    );
    return saved;
  }

  async find(entityName: string, context: ExtractionContext): Promise<Row[]> {
    const built = this.queries.build('find', context.with({ entityName }));
    return this.run('find', built, () => this.gateway.fetch(built.query, built.params));
  }

  /**
   * Correlation id stored for a session on a given day. The session id and
   * date are exposed to the query as context values `session_id` and `date`.
   */
  async findCorrelationId(sessionId: string, date: string, context: ExtractionContext): Promise<string | undefined> {
    const bound = context.with({ custom: { session_id: sessionId, date } });
    const built = this.queries.build('find_tidnid', bound);
    const rows = await this.run('find_tidnid', built, () => this.gateway.fetch(built.query, built.params));
    return firstColumn(rows[0]);
  }

  private async run<T>(operation: string, built: BuiltQuery, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      if (err instanceof RulepathError) throw err;
      this.logger.error({ err, operation, query: built.query }, 'Repository operation failed');
      throw new RepositoryError(operation, `Repository ${operation} failed: ${errorMessage(err)}`, err);
    }
  }
}

function firstColumn(row: Row | undefined): string | undefined {
  if (row === undefined) return undefined;
  const value: JsonValue | undefined = row['tidnid'] ?? Object.values(row)[0];
  if (typeof value === 'string' && value !== '') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}
