import { describe, it, expect } from 'vitest';
import {
  StrategyRegistry,
  buildRegistry,
  createDefaultStrategies,
  getSharedRegistry,
} from '../../../src/strategies/registry.js';
import { SetFixedValueStrategy } from '../../../src/strategies/set-fixed-value.js';
import type { ActionStrategy } from '../../../src/strategies/types.js';
import { STRATEGY_NAMES } from '../../../src/validation/constants.js';
import { createMockLogger } from '../../helpers/logger.js';

const constant: ActionStrategy = {
  name: 'set_fixed_value',
  execute: (_payload, _event, field) => ({ [field]: 'custom' }),
};

describe('createDefaultStrategies', () => {
  it('covers every strategy name once', () => {
    const names = createDefaultStrategies().map((strategy) => strategy.name);

    expect([...names].sort()).toEqual([...STRATEGY_NAMES].sort());
  });
});

describe('StrategyRegistry', () => {
  it('populates itself with the defaults on first lookup', () => {
    const registry = new StrategyRegistry();
    expect(registry.size).toBe(0);

    expect(registry.create('set_value')?.name).toBe('set_value');
    expect(registry.size).toBe(STRATEGY_NAMES.length);
  });

  it('looks names up case-insensitively', () => {
    const registry = buildRegistry();

    expect(registry.create('SET_FIXED_VALUE')).toBeInstanceOf(SetFixedValueStrategy);
    expect(registry.has('Extract_Value')).toBe(true);
  });

  it('keeps the first registration of a name', () => {
    const registry = new StrategyRegistry();

    expect(registry.register('Set_Fixed_Value', constant)).toBe(true);
    expect(registry.register('set_fixed_value', new SetFixedValueStrategy())).toBe(false);
    expect(registry.create('set_fixed_value')).toBe(constant);
  });

  it('does not add defaults once something is registered', () => {
    const registry = new StrategyRegistry();
    registry.register('set_fixed_value', constant);

    expect(registry.create('set_value')).toBeUndefined();
    expect(registry.names()).toEqual(['set_fixed_value']);
  });

  it('registers the defaults only once', () => {
    const registry = new StrategyRegistry();
    registry.registerDefaults();
    registry.registerDefaults();

    expect(registry.size).toBe(STRATEGY_NAMES.length);
  });

  it('lets custom strategies win over defaults registered later', () => {
    const registry = new StrategyRegistry();
    registry.register('set_fixed_value', constant);
    registry.registerDefaults();

    expect(registry.create('set_fixed_value')).toBe(constant);
    expect(registry.size).toBe(STRATEGY_NAMES.length);
  });

  it('returns undefined and warns for unknown strategies', () => {
    const logger = createMockLogger();
    const registry = buildRegistry({ logger });

    expect(registry.create('teleport')).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith({ strategy: 'teleport' }, 'Unsupported strategy');
  });
});

describe('getSharedRegistry', () => {
  it('returns the same registry every time', () => {
    expect(getSharedRegistry()).toBe(getSharedRegistry());
  });
});
