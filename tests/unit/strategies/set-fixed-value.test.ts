import { describe, it, expect } from 'vitest';
import { SetFixedValueStrategy } from '../../../src/strategies/set-fixed-value.js';

describe('SetFixedValueStrategy', () => {
  const strategy = new SetFixedValueStrategy();

  it('writes the configured literal', () => {
    expect(strategy.execute({ value: 'PREMIUM' }, {}, 'tier')).toEqual({ tier: 'PREMIUM' });
    expect(strategy.execute({ value: { a: [1] } }, {}, 'obj')).toEqual({ obj: { a: [1] } });
  });

  it('contributes nothing without a value', () => {
    expect(strategy.execute({}, {}, 'tier')).toEqual({});
  });
});
