import type { JsonObject } from '../../src/types/json.js';
import type { ConsumerConfig, SystemConfig } from '../../src/types/config.js';
import { Entity } from '../../src/core/entity.js';
import type { EntityInit } from '../../src/core/entity.js';

/** Envelope with the identifiers the pipeline reads. */
export function createEvent(overrides: {
  consumerId?: string;
  sessionId?: string;
  idService?: string;
  dataObject?: JsonObject;
  timestamp?: string;
} = {}): JsonObject {
  return {
    ...(overrides.timestamp !== undefined && { timestamp: overrides.timestamp }),
    jsonPayload: {
      dataObject: {
        consumer: {
          appConsumer: {
            id: overrides.consumerId ?? 'C1',
            sessionId: overrides.sessionId ?? 'S1',
          },
        },
        messages: { idService: overrides.idService ?? 'SVC1' },
        ...overrides.dataObject,
      },
    },
  };
}

export function createEntity(overrides: Partial<EntityInit> = {}): Entity {
  return new Entity({
    entityNames: ['orders'],
    sessionId: 'S1',
    correlationId: null,
    data: {
      idService: 'SVC1',
      timestamp: null,
      service: { idService: 'SVC1' },
      rules: {},
    },
    ...overrides,
  });
}

export function createConsumer(overrides: Partial<ConsumerConfig> = {}): ConsumerConfig {
  return {
    id: 'C1',
    services: [
      {
        idService: 'SVC1',
        paths: [{ path: 'jsonPayload.dataObject.messages.idService', enabled: true }],
        entity: ['orders'],
      },
    ],
    rules: [],
    queries: {},
    ...overrides,
  };
}

export function createConfig(consumers: ConsumerConfig[] = [createConsumer()]): SystemConfig {
  return { consumers, extensions: {} };
}

/** save, find and find_tidnid queries over a `sessions`-style schema. */
export function createQueries(): ConsumerConfig['queries'] {
  return {
    save: {
      query: 'INSERT INTO {0} (session_id, id_service, payload, day) VALUES ({1}, {2}, {3}, {4})',
      params: [
        { index: 0, placeholder: 'entity_names', type: 'structural', requires: '' },
        {
          index: 1,
          placeholder: '%s',
          type: 'parameter',
          requires: 'event_field',
          value: 'jsonPayload.dataObject.consumer.appConsumer.sessionId',
        },
        { index: 2, placeholder: '%s', type: 'parameter', requires: 'entity_data', value: 'id_service' },
        { index: 3, placeholder: '%s', type: 'parameter', requires: 'entity_data' },
        { index: 4, placeholder: '%s', type: 'parameter', requires: 'datetime_now', value: 'YYYY-MM-DD' },
      ],
    },
    find: {
      query: 'SELECT * FROM {0} WHERE session_id = {1} AND channel = {2}',
      params: [
        { index: 0, placeholder: 'entity_names', type: 'structural', requires: '' },
        {
          index: 1,
          placeholder: '%s',
          type: 'parameter',
          requires: 'event_field',
          value: 'jsonPayload.dataObject.consumer.appConsumer.sessionId',
        },
        {
          index: 2,
          placeholder: '%s',
          type: 'parameter',
          requires: 'event_field',
          value: 'jsonPayload.dataObject.messages.channel',
        },
      ],
    },
    find_tidnid: {
      query: 'SELECT tidnid FROM sessions WHERE session_id = {0} AND day = {1}',
      params: [
        { index: 0, placeholder: '%s', type: 'parameter', requires: 'context_value', value: 'session_id' },
        { index: 1, placeholder: '%s', type: 'parameter', requires: 'context_value', value: 'date' },
      ],
    },
  };
}
