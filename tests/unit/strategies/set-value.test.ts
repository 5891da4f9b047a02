import { describe, it, expect } from 'vitest';
import { SetValueStrategy } from '../../../src/strategies/set-value.js';

describe('SetValueStrategy', () => {
  const strategy = new SetValueStrategy();

  it('reads a literal key of a flattened event first', () => {
    const event = { 'order.id': 'O-1', order: { id: 'nested' } };

    expect(strategy.execute({ value: 'order.id' }, event, 'orderId')).toEqual({ orderId: 'O-1' });
  });

  it('falls back to path resolution', () => {
    const event = { order: { lines: [{ sku: 'A' }, { sku: 'B' }] } };

    expect(strategy.execute({ value: 'order.lines.sku' }, event, 'sku')).toEqual({ sku: 'A' });
  });

  it('contributes nothing for absent or null fields', () => {
    expect(strategy.execute({ value: 'order.id' }, { order: {} }, 'orderId')).toEqual({});
    expect(strategy.execute({ value: 'order.id' }, { order: { id: null } }, 'orderId')).toEqual({});
  });

  it('ignores keys the event does not hold itself', () => {
    expect(strategy.execute({ value: 'constructor' }, {}, 'out')).toEqual({});
    expect(strategy.execute({ value: 'order.toString' }, { order: {} }, 'out')).toEqual({});
  });

  it('contributes nothing without a source field name', () => {
    expect(strategy.execute({}, { a: 1 }, 'a')).toEqual({});
    expect(strategy.execute({ value: 3 }, { a: 1 }, 'a')).toEqual({});
  });

  it('carries the name it is registered under', () => {
    expect(strategy.name).toBe('set_value');
    expect(new SetValueStrategy('event_field').name).toBe('event_field');
  });
});
