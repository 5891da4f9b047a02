import type { JsonObject, JsonValue } from '../types/json.js';
import type { ConsumerConfig } from '../types/config.js';
import { ConfigurationError, EntityValidationError } from '../errors/index.js';
import { unflatten } from '../utils/flatten.js';
import { PathResolver } from '../utils/path-resolver.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { Entity } from './entity.js';
import { EVENT_PATHS } from './event-paths.js';
import { readCorrelationId, readIdentifier } from './extraction-context.js';
import type { RuleEngine } from './rule-engine.js';

/** Correlation id for a session when the event carries no document. */
export type CorrelationLookup = (sessionId: string) => string | null | undefined;

export interface EntityBuilderOptions {
  resolver?: PathResolver;
  logger?: Logger;
  /** Evaluation instant passed to the rule engine. */
  now?: () => Date;
}

interface DraftEntity {
  entityNames: string[];
  sessionId: string | undefined;
  correlationId: string | null;
  idService: string | null;
  timestamp: string | null;
  service: JsonObject;
  rules: JsonObject;
}

function emptyDraft(): DraftEntity {
  return {
    entityNames: [],
    sessionId: undefined,
    correlationId: null,
    idService: null,
    timestamp: null,
    service: {},
    rules: {},
  };
}

/**
 * Sestavuje entitu z jednoho eventu.
 *
 * ```ts
 * const entity = new EntityBuilder()
 *   .withEvent(event)
 *   .withSessionData(lookup)
 *   .withServiceData(consumers)
 *   .withRules(engine)
 *   .build();
 * ```
 *
 * `withEvent` must come first; the other steps throw
 * {@link ConfigurationError} when it has not been called.
 */
export class EntityBuilder {
  private readonly resolver: PathResolver;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private event: JsonValue | undefined;
  private draft: DraftEntity = emptyDraft();

  constructor(options: EntityBuilderOptions = {}) {
    this.resolver = options.resolver ?? new PathResolver();
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  reset(): this {
    this.event = undefined;
    this.draft = emptyDraft();
    return this;
  }

  withEvent(event: JsonValue): this {
    this.event = unflatten(event);
    return this;
  }

  withSessionData(lookup?: CorrelationLookup): this {
    const event = this.requireEvent('withSessionData');

    const sessionId = readIdentifier(this.resolver, EVENT_PATHS.sessionId, event);
    if (sessionId === undefined) {
      throw new ConfigurationError(`Session id not found at '${EVENT_PATHS.sessionId}'`);
    }
    this.draft.sessionId = sessionId;

    let correlationId = readCorrelationId(this.resolver, event) ?? null;
    if (correlationId === null && lookup !== undefined) {
      try {
        correlationId = lookup(sessionId) ?? null;
      } catch (err) {
        this.logger.error({ err, sessionId }, 'Correlation id lookup failed');
      }
    }
    this.draft.correlationId = correlationId;

    return this;
  }

  withServiceData(consumers: readonly ConsumerConfig[]): this {
    const event = this.requireEvent('withServiceData');

    const idService = readIdentifier(this.resolver, EVENT_PATHS.idService, event);
    const consumerId = readIdentifier(this.resolver, EVENT_PATHS.appConsumerId, event);
    if (idService === undefined || consumerId === undefined) {
      throw new ConfigurationError('Service id or consumer id not found in event');
    }

    const services = consumers
      .filter((consumer) => consumer.id === consumerId)
      .flatMap((consumer) => consumer.services)
      .filter((service) => service.idService === idService);

    let entityNames = services.flatMap((service) => service.entity);
    if (entityNames.length === 0) {
      const workflow = readIdentifier(this.resolver, EVENT_PATHS.transactionName, event);
      if (workflow !== undefined) {
        entityNames = [workflow];
      }
    }

    const service: JsonObject = {};
    for (const config of services) {
      for (const [key, value] of this.resolver.extractSelected(config.paths, event)) {
        service[key] = value;
      }
    }

    this.draft.entityNames = entityNames;
    this.draft.idService = idService;
    this.draft.timestamp = readTimestamp(this.resolver.get(EVENT_PATHS.timestamp, event));
    this.draft.service = service;

    return this;
  }

  /** Optional. A failing engine leaves the rule output empty. */
  withRules(engine?: RuleEngine): this {
    if (engine === undefined || this.event === undefined) {
      this.draft.rules = {};
      return this;
    }

    try {
      this.draft.rules = engine.processEvent(this.event, this.now());
    } catch (err) {
      this.logger.error({ err }, 'Rule evaluation failed');
      this.draft.rules = {};
    }
    return this;
  }

  build(): Entity {
    const { entityNames, sessionId } = this.draft;
    if (entityNames.length === 0) {
      throw new EntityValidationError('entity_names', 'Entity must have at least one entity name');
    }
    if (sessionId === undefined || sessionId === '') {
      throw new EntityValidationError('session_id', 'Entity must have a session id');
    }

    return new Entity({
      entityNames,
      sessionId,
      correlationId: this.draft.correlationId,
      data: {
        idService: this.draft.idService,
        timestamp: this.draft.timestamp,
        service: this.draft.service,
        rules: this.draft.rules,
      },
    });
  }

  private requireEvent(step: string): JsonValue {
    if (this.event === undefined) {
      throw new ConfigurationError(`withEvent() must be called before ${step}()`);
    }
    return this.event;
  }
}

function readTimestamp(value: JsonValue | undefined): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}
