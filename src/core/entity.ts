import type { JsonObject, JsonValue } from '../types/json.js';
import { isJsonObject } from '../types/json.js';
import type { EntityData, EntityRecord } from '../types/entity.js';
import { EntityValidationError } from '../errors/index.js';

export interface EntityInit {
  entityNames: readonly string[];
  sessionId: string;
  correlationId?: string | null;
  data: EntityData;
}

function deepFreeze(value: JsonValue): void {
  if (Array.isArray(value)) {
    value.forEach(deepFreeze);
    Object.freeze(value);
  } else if (isJsonObject(value)) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
}

function frozenCopy(value: JsonObject): JsonObject {
  const copy = structuredClone(value);
  deepFreeze(copy);
  return copy;
}

function cloneObject(value: JsonObject): JsonObject {
  return structuredClone(value);
}

/**
 * Persistable record assembled from one event. Immutable once constructed.
 */
export class Entity {
  readonly entityNames: readonly string[];
  readonly sessionId: string;
  readonly correlationId: string | null;
  readonly data: Readonly<EntityData>;

  constructor(init: EntityInit) {
    if (init.entityNames.length === 0) {
      throw new EntityValidationError('entity_names', 'Entity requires at least one entity name');
    }
    if (init.sessionId.trim() === '') {
      throw new EntityValidationError('session_id', 'Entity requires a session id');
    }

    this.entityNames = Object.freeze([...init.entityNames]);
    this.sessionId = init.sessionId;
    this.correlationId = init.correlationId ?? null;
    this.data = Object.freeze({
      idService: init.data.idService,
      timestamp: init.data.timestamp,
      service: frozenCopy(init.data.service),
      rules: frozenCopy(init.data.rules),
    });
    Object.freeze(this);
  }

  toJSON(): EntityRecord {
    return {
      entity_names: [...this.entityNames],
      session_id: this.sessionId,
      tidnid: this.correlationId,
      data: {
        id_service: this.data.idService,
        timestamp: this.data.timestamp,
        service: cloneObject(this.data.service),
        rules: cloneObject(this.data.rules),
      },
    };
  }

  static fromJSON(record: JsonValue): Entity {
    if (!isJsonObject(record)) {
      throw new EntityValidationError('(root)', 'Entity record must be an object');
    }

    const names = record['entity_names'];
    if (!Array.isArray(names) || !names.every((name): name is string => typeof name === 'string')) {
      throw new EntityValidationError('entity_names', 'entity_names must be an array of strings');
    }

    const sessionId = record['session_id'];
    if (typeof sessionId !== 'string') {
      throw new EntityValidationError('session_id', 'session_id must be a string');
    }

    const tidnid = record['tidnid'];
    const data = record['data'];
    if (!isJsonObject(data)) {
      throw new EntityValidationError('data', 'data must be an object');
    }

    const service = data['service'];
    const rules = data['rules'];
    return new Entity({
      entityNames: names,
      sessionId,
      correlationId: typeof tidnid === 'string' ? tidnid : null,
      data: {
        idService: optionalString(data['id_service']),
        timestamp: optionalString(data['timestamp']),
        service: isJsonObject(service) ? service : {},
        rules: isJsonObject(rules) ? rules : {},
      },
    });
  }
}

function optionalString(value: JsonValue | undefined): string | null {
  return typeof value === 'string' ? value : null;
}
