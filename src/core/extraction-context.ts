import type { JsonValue } from '../types/json.js';
import { isJsonObject } from '../types/json.js';
import type { ConsumerConfig, ServiceConfig } from '../types/config.js';
import type { QueryConfig, QueryKind } from '../types/parameter.js';
import { unflatten } from '../utils/flatten.js';
import { PathResolver } from '../utils/path-resolver.js';
import type { Entity } from './entity.js';
import { CORRELATION_DOCUMENT_PATHS, EVENT_PATHS } from './event-paths.js';

export interface ExtractionContextInit {
  event: JsonValue;
  consumers?: readonly ConsumerConfig[];
  entity?: Entity;
  /** Entity name being persisted; defaults to the entity's first name. */
  entityName?: string;
  custom?: Readonly<Record<string, JsonValue>>;
  resolver?: PathResolver;
}

const sharedResolver = new PathResolver();

/** Reads an identifier: strings are trimmed, numbers stringified, anything else is absent. */
export function readIdentifier(resolver: PathResolver, path: string, event: JsonValue): string | undefined {
  const value = resolver.get(path, event);
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

/** `type-number` from the first document block that carries both. */
export function readCorrelationId(resolver: PathResolver, event: JsonValue): string | undefined {
  for (const path of CORRELATION_DOCUMENT_PATHS) {
    const document = resolver.get(path, event);
    if (!isJsonObject(document)) continue;

    const type = firstPresent(document['tipo'], document['type']);
    const number = firstPresent(document['numero'], document['number']);
    if (type !== undefined && number !== undefined) {
      return `${type}-${number}`;
    }
  }
  return undefined;
}

function firstPresent(...values: Array<JsonValue | undefined>): string | undefined {
  for (const value of values) {
    if (typeof value === 'string' && value.trim() !== '') return value.trim();
    if (typeof value === 'number') return String(value);
  }
  return undefined;
}

/**
 * Everything a query parameter may draw on: the event, the entity being
 * persisted, caller-supplied values and the consumer configuration.
 * Identifiers are read lazily and memoised.
 */
export class ExtractionContext {
  readonly event: JsonValue;
  readonly entity: Entity | undefined;
  private readonly consumers: readonly ConsumerConfig[];
  private readonly custom: Readonly<Record<string, JsonValue>>;
  private readonly entityName: string | undefined;
  private readonly resolver: PathResolver;
  private readonly memo = new Map<string, string | undefined>();

  constructor(init: ExtractionContextInit) {
    this.event = unflatten(init.event);
    this.entity = init.entity;
    this.consumers = init.consumers ?? [];
    this.custom = init.custom ?? {};
    this.entityName = init.entityName;
    this.resolver = init.resolver ?? sharedResolver;
  }

  /** Copy bound to a different entity or entity name; `custom` values are merged over the current ones. */
  with(changes: Pick<ExtractionContextInit, 'entity' | 'entityName' | 'custom'>): ExtractionContext {
    return new ExtractionContext({
      event: this.event,
      consumers: this.consumers,
      resolver: this.resolver,
      entity: changes.entity ?? this.entity,
      entityName: changes.entityName ?? this.entityName,
      custom: changes.custom === undefined ? this.custom : { ...this.custom, ...changes.custom },
    });
  }

  getEntityName(): string | undefined {
    return this.entityName ?? this.entity?.entityNames[0];
  }

  getAppConsumerId(): string | undefined {
    return this.identifier(EVENT_PATHS.appConsumerId);
  }

  getIdService(): string | undefined {
    return this.identifier(EVENT_PATHS.idService);
  }

  getSessionId(): string | undefined {
    return this.identifier(EVENT_PATHS.sessionId);
  }

  getCorrelationId(): string | undefined {
    if (!this.memo.has('correlationId')) {
      this.memo.set('correlationId', readCorrelationId(this.resolver, this.event));
    }
    return this.memo.get('correlationId');
  }

  getContextValue(key: string): JsonValue | undefined {
    return Object.hasOwn(this.custom, key) ? this.custom[key] : undefined;
  }

  getConsumer(): ConsumerConfig | undefined {
    const consumerId = this.getAppConsumerId();
    if (consumerId === undefined) return undefined;
    return this.consumers.find((consumer) => consumer.id === consumerId);
  }

  getServiceConfig(): ServiceConfig | undefined {
    const idService = this.getIdService();
    return this.getConsumer()?.services.find((service) => service.idService === idService);
  }

  getQueryConfig(kind: QueryKind): QueryConfig | undefined {
    return this.getConsumer()?.queries[kind];
  }

  private identifier(path: string): string | undefined {
    if (!this.memo.has(path)) {
      this.memo.set(path, readIdentifier(this.resolver, path, this.event));
    }
    return this.memo.get(path);
  }
}
