import { describe, it, expect } from 'vitest';
import { InMemoryPersistenceGateway } from '../../../src/persistence/gateway.js';

describe('InMemoryPersistenceGateway', () => {
  it('records executed statements', async () => {
    const gateway = new InMemoryPersistenceGateway();

    expect(await gateway.execute('INSERT INTO t VALUES (%s)', ['a'])).toBe(true);
    expect(gateway.executed).toEqual([{ query: 'INSERT INTO t VALUES (%s)', params: ['a'] }]);
  });

  it('keeps only the newest statements when bounded', async () => {
    const gateway = new InMemoryPersistenceGateway({ maxRecorded: 2 });

    for (let i = 0; i < 1000; i++) {
      await gateway.execute('INSERT INTO t VALUES (%s)', [i]);
      await gateway.fetch('SELECT * FROM t WHERE id = %s', [i]);
    }

    expect(gateway.executed.map((statement) => statement.params)).toEqual([[998], [999]]);
    expect(gateway.fetched).toHaveLength(2);
  });

  it('records nothing with a zero bound', async () => {
    const gateway = new InMemoryPersistenceGateway({ maxRecorded: 0 });

    expect(await gateway.execute('SELECT 1', [])).toBe(true);
    expect(gateway.executed).toEqual([]);
  });

  it('answers fetches from the first matching response', async () => {
    const gateway = new InMemoryPersistenceGateway()
      .respondWith('FROM sessions', [{ tidnid: 'CC-1' }])
      .respondWith((_query, params) => params[0] === 'S2', [{ tidnid: 'CC-2' }]);

    expect(await gateway.fetch('SELECT tidnid FROM sessions', ['S2'])).toEqual([{ tidnid: 'CC-1' }]);
    expect(await gateway.fetch('SELECT tidnid FROM archive', ['S2'])).toEqual([{ tidnid: 'CC-2' }]);
    expect(await gateway.fetch('SELECT 1', [])).toEqual([]);
    expect(gateway.fetched).toHaveLength(3);
  });

  it('returns copies of the scripted rows', async () => {
    const gateway = new InMemoryPersistenceGateway().respondWith('t', [{ a: 1 }]);
    const [row] = await gateway.fetch('SELECT * FROM t', []);
    if (row !== undefined) row['a'] = 2;

    expect(await gateway.fetch('SELECT * FROM t', [])).toEqual([{ a: 1 }]);
  });

  it('fails every call until the failure is cleared', async () => {
    const gateway = new InMemoryPersistenceGateway().failWith(new Error('connection refused'));

    await expect(gateway.execute('SELECT 1', [])).rejects.toThrow('connection refused');
    expect(await gateway.ping()).toBe(false);

    gateway.failWith(undefined);

    expect(await gateway.ping()).toBe(true);
    expect(await gateway.execute('SELECT 1', [])).toBe(true);
  });

  it('refuses calls once closed', async () => {
    const gateway = new InMemoryPersistenceGateway();
    await gateway.close();

    await expect(gateway.fetch('SELECT 1', [])).rejects.toThrow('Gateway is closed');
    expect(await gateway.ping()).toBe(false);
  });
});
