/**
 * Strategy registry.
 *
 * Names are matched case-insensitively. Registration is first-writer-wins:
 * registering a name that is already present is a no-op. A registry that is
 * still empty on first lookup populates itself with the defaults.
 *
 * @module
 */

import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { PathResolver } from '../utils/path-resolver.js';
import type { QueryFn } from '../utils/json-query.js';
import { searchJson } from '../utils/json-query.js';
import type { ActionStrategy } from './types.js';
import { SetFixedValueStrategy } from './set-fixed-value.js';
import { SetValueStrategy } from './set-value.js';
import { ExtractValueStrategy } from './extract-value.js';
import { DatetimeNowStrategy } from './datetime-now.js';
import { EntityDataStrategy } from './entity-data.js';
import { ContextValueStrategy } from './context-value.js';
import { TimeDifferenceStrategy } from './time-difference.js';

export interface StrategyDefaultsOptions {
  /** Clock for `datetime_now`. */
  now?: () => Date;
  search?: QueryFn;
  resolver?: PathResolver;
}

export interface StrategyRegistryOptions extends StrategyDefaultsOptions {
  logger?: Logger;
}

export function createDefaultStrategies(options: StrategyDefaultsOptions = {}): ActionStrategy[] {
  const resolver = options.resolver ?? new PathResolver();
  return [
    new SetFixedValueStrategy(),
    new SetValueStrategy('set_value', resolver),
    new SetValueStrategy('event_field', resolver),
    new ExtractValueStrategy(options.search ?? searchJson, resolver),
    new DatetimeNowStrategy(options.now),
    new EntityDataStrategy(),
    new ContextValueStrategy(),
    new TimeDifferenceStrategy(resolver),
  ];
}

export class StrategyRegistry {
  private readonly strategies = new Map<string, ActionStrategy>();
  private readonly logger: Logger;
  private readonly defaults: StrategyDefaultsOptions;
  private initialized = false;

  constructor(options: StrategyRegistryOptions = {}) {
    const { logger, ...defaults } = options;
    this.logger = logger ?? silentLogger;
    this.defaults = defaults;
  }

  /** Returns false when the name was already taken. */
  register(name: string, strategy: ActionStrategy): boolean {
    const key = name.toLowerCase();
    if (this.strategies.has(key)) {
      return false;
    }
    this.strategies.set(key, strategy);
    return true;
  }

  registerDefaults(): void {
    if (this.initialized) return;
    this.initialized = true;
    for (const strategy of createDefaultStrategies(this.defaults)) {
      this.register(strategy.name, strategy);
    }
  }

  create(name: string): ActionStrategy | undefined {
    if (this.strategies.size === 0) {
      this.registerDefaults();
    }

    const strategy = this.strategies.get(name.toLowerCase());
    if (strategy === undefined) {
      this.logger.warn({ strategy: name }, 'Unsupported strategy');
    }
    return strategy;
  }

  has(name: string): boolean {
    return this.strategies.has(name.toLowerCase());
  }

  names(): string[] {
    return [...this.strategies.keys()];
  }

  get size(): number {
    return this.strategies.size;
  }
}

/** Fresh registry with the default strategies already registered. */
export function buildRegistry(options: StrategyRegistryOptions = {}): StrategyRegistry {
  const registry = new StrategyRegistry(options);
  registry.registerDefaults();
  return registry;
}

let shared: StrategyRegistry | undefined;

/** Process-wide registry used when none is injected. */
export function getSharedRegistry(): StrategyRegistry {
  shared ??= new StrategyRegistry();
  return shared;
}
