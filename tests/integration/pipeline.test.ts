/**
 * Integrační test celé pipeline: konfigurace ze souboru, event z fixture,
 * uložení přes in-memory gateway.
 */

import { describe, it, expect, beforeAll, beforeEach } from 'vitest';
import { readFileSync } from 'node:fs';
import { loadConfigFromFile } from '../../src/config/loader.js';
import { createEventProcessor, processBatch } from '../../src/core/event-processor.js';
import type { EventProcessor } from '../../src/core/event-processor.js';
import { InMemoryPersistenceGateway } from '../../src/persistence/gateway.js';
import { buildRegistry } from '../../src/strategies/registry.js';
import type { SystemConfig } from '../../src/types/config.js';
import { fixturePath } from '../helpers/paths.js';

const now = () => new Date('2024-05-06T10:00:00Z');

const PAYLOAD = JSON.stringify({
  id_service: 'SVC1',
  timestamp: '2024-05-06T09:30:00Z',
  service: { idService: 'SVC1', total: 150 },
  rules: { tier: 'gold', region: 'LATAM', source: 'web' },
});

describe('Event pipeline (integration)', () => {
  let config: SystemConfig;
  let event: unknown;
  let gateway: InMemoryPersistenceGateway;
  let processor: EventProcessor;

  beforeAll(async () => {
    ({ config } = await loadConfigFromFile(fixturePath('consumers.yaml')));
    event = JSON.parse(readFileSync(fixturePath('event.json'), 'utf-8'));
  });

  beforeEach(() => {
    gateway = new InMemoryPersistenceGateway();
    processor = createEventProcessor(config, { gateway, registry: buildRegistry({ now }), now });
  });

  it('builds and saves the entity for a queued message', async () => {
    const outcome = await processor.processAndSave({ messageId: 'q-1', body: JSON.stringify(event) });

    expect(outcome.status).toBe('success');
    expect(gateway.executed).toEqual([
      {
        query: 'INSERT INTO orders (session_id, id_service, payload) VALUES (%s, %s, %s)',
        params: ['S1', 'SVC1', PAYLOAD],
      },
    ]);
  });

  it('looks up the correlation id for events without a document block', async () => {
    gateway.respondWith('FROM sessions', [{ tidnid: 'CC-42' }]);

    const outcome = await processor.processAndSave(event);

    expect(gateway.fetched).toEqual([
      { query: 'SELECT tidnid FROM sessions WHERE session_id = %s AND day = %s', params: ['S1', '20240506'] },
    ]);
    expect(outcome.status === 'success' ? outcome.entity.correlationId : undefined).toBe('CC-42');
  });

  it('processes a batch record by record', async () => {
    const results = await processBatch(processor, [
      { messageId: 'q-1', body: JSON.stringify(event) },
      { messageId: 'q-2', body: '{"jsonPayload": {}}' },
    ]);

    expect(results[0]).toEqual({ messageId: 'q-1', status: 'success', sessionId: 'S1', entities: ['orders'] });
    expect(results[1]).toMatchObject({ messageId: 'q-2', status: 'error' });
    expect(gateway.executed).toHaveLength(1);
  });
});
