import type { JsonValue } from '../types/json.js';
import type { MergePolicy, Rule } from '../types/rule.js';
import type { SystemConfig } from '../types/config.js';
import type { QueryKind } from '../types/parameter.js';
import { RulepathError, errorMessage } from '../errors/index.js';
import type { StrategyRegistry } from '../strategies/registry.js';
import { SqlQueryService } from '../query/sql-query-service.js';
import { ParameterExtractionService } from '../query/parameter-extraction-service.js';
import type { BuiltQuery } from '../query/query-builder.js';
import { EntityRepository } from '../persistence/entity-repository.js';
import type { PersistenceGateway } from '../persistence/gateway.js';
import { formatDate } from '../utils/date-format.js';
import { unflatten } from '../utils/flatten.js';
import { PathResolver } from '../utils/path-resolver.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { Entity } from './entity.js';
import { EntityBuilder } from './entity-builder.js';
import type { CorrelationLookup } from './entity-builder.js';
import { EVENT_PATHS } from './event-paths.js';
import { ExtractionContext, readCorrelationId, readIdentifier } from './extraction-context.js';
import { parseRecord } from './record-parser.js';
import { RuleEngine } from './rule-engine.js';
import type { RuleEvaluation } from './rule-engine.js';

export interface EventProcessorOptions {
  config: SystemConfig;
  /** Without a repository nothing is persisted and no correlation lookup happens. */
  repository?: EntityRepository;
  queries?: SqlQueryService;
  registry?: StrategyRegistry;
  mergePolicy?: MergePolicy;
  logger?: Logger;
  now?: () => Date;
}

export type ProcessOutcome =
  | { status: 'success'; messageId: string | undefined; entity: Entity }
  | { status: 'error'; messageId: string | undefined; error: string; code?: string };

export interface PreviewQuery extends BuiltQuery {
  entityName: string;
  kind: QueryKind;
}

export interface PreviewResult {
  entity: Entity;
  rules: RuleEvaluation[];
  queries: PreviewQuery[];
}

/**
 * Pipeline for one inbound message: decode, pick the rules, build the entity
 * and save it once per entity name.
 */
export class EventProcessor {
  private readonly config: SystemConfig;
  private readonly repository: EntityRepository | undefined;
  private readonly queries: SqlQueryService;
  private readonly registry: StrategyRegistry | undefined;
  private readonly mergePolicy: MergePolicy;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly resolver: PathResolver;

  constructor(options: EventProcessorOptions) {
    this.config = options.config;
    this.repository = options.repository;
    this.logger = options.logger ?? silentLogger;
    this.registry = options.registry;
    this.queries = options.queries ?? new SqlQueryService({
      logger: this.logger,
      extraction: new ParameterExtractionService({ registry: this.registry, logger: this.logger }),
    });
    this.mergePolicy = options.mergePolicy ?? 'overwrite';
    this.now = options.now ?? (() => new Date());
    this.resolver = new PathResolver({ logger: this.logger });
  }

  /** Rules of the event's consumer whose event type is the event's service id. */
  getRules(event: JsonValue): Rule[] | undefined {
    const nested = unflatten(event);
    const idService = readIdentifier(this.resolver, EVENT_PATHS.idService, nested);
    const consumerId = readIdentifier(this.resolver, EVENT_PATHS.appConsumerId, nested);
    if (idService === undefined || consumerId === undefined) {
      this.logger.warn('Event carries no service id or consumer id');
      return undefined;
    }

    const rules = this.config.consumers
      .filter((consumer) => consumer.id === consumerId)
      .flatMap((consumer) => consumer.rules);
    if (rules.length === 0) {
      this.logger.info({ consumerId }, 'No rules configured for consumer');
      return undefined;
    }

    const matching = rules.filter((rule) => rule.eventType === idService);
    if (matching.length === 0) {
      this.logger.info({ consumerId, idService }, 'No rules configured for service');
    }
    return matching;
  }

  buildEntity(event: JsonValue, rules?: readonly Rule[], lookup?: CorrelationLookup): Entity {
    const engine = rules !== undefined && rules.length > 0 ? this.createEngine(rules) : undefined;

    return new EntityBuilder({ resolver: this.resolver, logger: this.logger, now: this.now })
      .withEvent(event)
      .withSessionData(lookup)
      .withServiceData(this.config.consumers)
      .withRules(engine)
      .build();
  }

  /**
   * Resolves the correlation id from the repository ahead of the build when
   * the event has no document block. Lookup failures are logged and yield
   * no id.
   */
  async correlationLookup(event: JsonValue): Promise<CorrelationLookup | undefined> {
    if (this.repository === undefined) return undefined;

    const context = this.createContext(event);
    if (readCorrelationId(this.resolver, context.event) !== undefined) return undefined;

    const sessionId = context.getSessionId();
    if (sessionId === undefined || !this.queries.hasQuery('find_tidnid', context)) {
      return undefined;
    }

    try {
      const date = formatDate(this.now(), 'YYYYMMDD');
      const correlationId = await this.repository.findCorrelationId(sessionId, date, context);
      return () => correlationId;
    } catch (err) {
      this.logger.error({ err, sessionId }, 'Correlation id lookup failed');
      return undefined;
    }
  }

  /** Saves under every entity name; stops at the first failure. */
  async saveEntity(entity: Entity, event: JsonValue): Promise<boolean> {
    if (this.repository === undefined) {
      throw new RulepathError('No repository configured');
    }

    const context = this.createContext(event).with({ entity });
    for (const entityName of entity.entityNames) {
      const saved = await this.repository.save(entity, context.with({ entityName }));
      if (!saved) {
        this.logger.error({ entityName, sessionId: entity.sessionId }, 'Entity was not saved');
        return false;
      }
    }
    return true;
  }

  /** Never throws; every failure is reported in the outcome. */
  async processAndSave(record: unknown): Promise<ProcessOutcome> {
    let messageId: string | undefined;
    try {
      const parsed = parseRecord(record);
      messageId = parsed.messageId;

      const rules = this.getRules(parsed.event);
      const lookup = await this.correlationLookup(parsed.event);
      const entity = this.buildEntity(parsed.event, rules, lookup);
      this.logger.debug(
        { entityNames: entity.entityNames, service: entity.data.service, rules: entity.data.rules },
        'Entity built',
      );

      const saved = await this.saveEntity(entity, parsed.event);
      if (!saved) {
        return { status: 'error', messageId, error: 'Entity could not be saved' };
      }
      return { status: 'success', messageId, entity };
    } catch (err) {
      this.logger.error({ err, messageId }, 'Message processing failed');
      return {
        status: 'error',
        messageId,
        error: errorMessage(err),
        ...(err instanceof RulepathError && { code: err.code }),
      };
    }
  }

  /** Builds the entity and its save queries without touching persistence. */
  preview(record: unknown): PreviewResult {
    const { event } = parseRecord(record);
    const rules = this.getRules(event) ?? [];
    const entity = this.buildEntity(event, rules);

    const context = this.createContext(event).with({ entity });
    const queries: PreviewQuery[] = [];
    if (this.queries.hasQuery('save', context)) {
      for (const entityName of entity.entityNames) {
        const built = this.queries.build('save', context.with({ entityName }));
        queries.push({ entityName, kind: 'save', ...built });
      }
    }

    const evaluations = rules.length > 0 ? this.createEngine(rules).evaluate(event, this.now()) : [];
    return { entity, rules: evaluations, queries };
  }

  private createEngine(rules: readonly Rule[]): RuleEngine {
    return new RuleEngine(rules, {
      registry: this.registry,
      extensions: this.config.extensions,
      mergePolicy: this.mergePolicy,
      resolver: this.resolver,
      logger: this.logger,
    });
  }

  private createContext(event: JsonValue): ExtractionContext {
    return new ExtractionContext({ event, consumers: this.config.consumers, resolver: this.resolver });
  }
}

export interface BatchItemResult {
  messageId: string;
  status: 'success' | 'error';
  sessionId?: string;
  entities?: string[];
  error?: string;
  code?: string;
}

/** Processes each record independently, in order. */
export async function processBatch(
  processor: EventProcessor,
  records: readonly unknown[],
): Promise<BatchItemResult[]> {
  const results: BatchItemResult[] = [];

  for (const [index, record] of records.entries()) {
    const outcome = await processor.processAndSave(record);
    const messageId = outcome.messageId ?? `record-${index}`;

    if (outcome.status === 'success') {
      results.push({
        messageId,
        status: 'success',
        sessionId: outcome.entity.sessionId,
        entities: [...outcome.entity.entityNames],
      });
    } else {
      results.push({
        messageId,
        status: 'error',
        error: outcome.error,
        ...(outcome.code !== undefined && { code: outcome.code }),
      });
    }
  }

  return results;
}

export interface PipelineOptions {
  /** Without a gateway entities are built but never saved. */
  gateway?: PersistenceGateway;
  registry?: StrategyRegistry;
  mergePolicy?: MergePolicy;
  logger?: Logger;
  now?: () => Date;
}

/** Wires a processor, its query service and repository around one gateway. */
export function createEventProcessor(config: SystemConfig, options: PipelineOptions = {}): EventProcessor {
  const logger = options.logger ?? silentLogger;
  const queries = new SqlQueryService({
    logger,
    extraction: new ParameterExtractionService({ registry: options.registry, logger }),
  });

  return new EventProcessor({
    config,
    queries,
    logger,
    ...(options.gateway !== undefined && { repository: new EntityRepository(options.gateway, queries, logger) }),
    ...(options.registry !== undefined && { registry: options.registry }),
    ...(options.mergePolicy !== undefined && { mergePolicy: options.mergePolicy }),
    ...(options.now !== undefined && { now: options.now }),
  });
}
