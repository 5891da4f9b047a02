import { describe, it, expect } from 'vitest';
import { SqlQueryService } from '../../../src/query/sql-query-service.js';
import { ParameterExtractionService } from '../../../src/query/parameter-extraction-service.js';
import { ExtractionContext } from '../../../src/core/extraction-context.js';
import { buildRegistry } from '../../../src/strategies/registry.js';
import type { ConsumerConfig } from '../../../src/types/config.js';
import type { JsonObject } from '../../../src/types/json.js';
import { createConsumer, createEntity, createEvent, createQueries } from '../../helpers/fixtures.js';

const now = () => new Date('2024-05-06T10:00:00Z');
const service = new SqlQueryService({
  extraction: new ParameterExtractionService({ registry: buildRegistry({ now }) }),
});

function contextFor(consumer: ConsumerConfig, event: JsonObject = createEvent()): ExtractionContext {
  return new ExtractionContext({ event, consumers: [consumer], entity: createEntity() });
}

describe('SqlQueryService', () => {
  const context = contextFor(createConsumer({ queries: createQueries() }));

  it('builds the configured save query', () => {
    expect(service.build('save', context)).toEqual({
      query: 'INSERT INTO orders (session_id, id_service, payload, day) VALUES (%s, %s, %s, %s)',
      params: [
        'S1',
        'SVC1',
        '{"id_service":"SVC1","timestamp":null,"service":{"idService":"SVC1"},"rules":{}}',
        '2024-05-06',
      ],
    });
  });

  it('builds find queries without unresolved trailing values', () => {
    expect(service.build('find', context)).toEqual({
      query: 'SELECT * FROM orders WHERE session_id = %s AND channel = %s',
      params: ['S1'],
    });
  });

  it('lists the kinds the consumer configures', () => {
    const partial = contextFor(createConsumer({ queries: { save: createQueries().save } }));

    expect(service.availableKinds(context)).toEqual(['save', 'find', 'find_tidnid']);
    expect(service.availableKinds(partial)).toEqual(['save']);
    expect(service.hasQuery('find', partial)).toBe(false);
  });

  describe('configuration errors', () => {
    it('reports an unknown consumer', () => {
      const unknown = contextFor(createConsumer(), createEvent({ consumerId: 'C9' }));

      expect(() => service.build('save', unknown)).toThrow("No configuration for appConsumer='C9'");
    });

    it('reports an event without consumer id', () => {
      const anonymous = contextFor(createConsumer(), { jsonPayload: {} });

      expect(() => service.build('save', anonymous)).toThrow("No configuration for appConsumer='(unknown)'");
    });

    it('reports a missing query kind', () => {
      expect(() => service.build('save', contextFor(createConsumer()))).toThrow(
        "No 'save' query for appConsumer='C1'",
      );
    });

    it('reports empty SQL text and empty parameter lists', () => {
      const blank = contextFor(createConsumer({ queries: { save: { query: '  ', params: [] } } }));
      const bare = contextFor(createConsumer({ queries: { save: { query: 'SELECT 1', params: [] } } }));

      expect(() => service.build('save', blank)).toThrow("Query 'save' has no SQL text for appConsumer='C1'");
      expect(() => service.build('save', bare)).toThrow("Query 'save' has no parameters for appConsumer='C1'");
    });
  });
});
