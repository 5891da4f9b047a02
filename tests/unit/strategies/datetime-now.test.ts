import { describe, it, expect, vi } from 'vitest';
import { DatetimeNowStrategy } from '../../../src/strategies/datetime-now.js';

describe('DatetimeNowStrategy', () => {
  const now = () => new Date(Date.UTC(2024, 2, 9, 23, 59, 1));

  it('formats the current instant as YYYYMMDD by default', () => {
    expect(new DatetimeNowStrategy(now).execute({}, {}, 'day')).toEqual({ day: '20240309' });
  });

  it('uses the configured pattern', () => {
    const strategy = new DatetimeNowStrategy(now);

    expect(strategy.execute({ value: '%Y-%m-%dT%H:%M:%S' }, {}, 'at')).toEqual({ at: '2024-03-09T23:59:01' });
    expect(strategy.execute({ value: 'HHmm' }, {}, 'at')).toEqual({ at: '2359' });
  });

  it('reads the clock on every call', () => {
    const clock = vi.fn()
      .mockReturnValueOnce(new Date(Date.UTC(2024, 0, 1)))
      .mockReturnValueOnce(new Date(Date.UTC(2024, 0, 2)));
    const strategy = new DatetimeNowStrategy(clock);

    expect(strategy.execute({}, {}, 'd')).toEqual({ d: '20240101' });
    expect(strategy.execute({}, {}, 'd')).toEqual({ d: '20240102' });
  });
});
