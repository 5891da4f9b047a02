import { describe, it, expect } from 'vitest';
import { TimeDifferenceStrategy } from '../../../src/strategies/time-difference.js';

describe('TimeDifferenceStrategy', () => {
  const strategy = new TimeDifferenceStrategy();
  const event = {
    order: {
      createdAt: '2024-01-01T10:00:00Z',
      paidAt: '2024-01-01T10:01:30.500Z',
    },
  };

  it('returns the seconds between two event timestamps', () => {
    const result = strategy.execute(
      { params: { startTime: 'order.createdAt', endTime: 'order.paidAt' } },
      event,
      'elapsed',
    );

    expect(result).toEqual({ elapsed: 90.5 });
  });

  it('strips a leading $ from field references', () => {
    const result = strategy.execute(
      { params: { startTime: '$order.paidAt', endTime: '$order.createdAt' } },
      event,
      'elapsed',
    );

    expect(result).toEqual({ elapsed: -90.5 });
  });

  it('contributes nothing when a bound is missing or unparseable', () => {
    expect(strategy.execute({ params: { startTime: 'order.createdAt' } }, event, 'e')).toEqual({});
    expect(strategy.execute(
      { params: { startTime: 'order.createdAt', endTime: 'order.unknown' } },
      event,
      'e',
    )).toEqual({});
    expect(strategy.execute(
      { params: { startTime: 'order.createdAt', endTime: 'order.note' } },
      { order: { ...event.order, note: 'soon' } },
      'e',
    )).toEqual({});
  });
});
