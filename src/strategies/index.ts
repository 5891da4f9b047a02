export type { ActionStrategy, StrategyContext, StrategyResult } from './types.js';
export {
  StrategyRegistry,
  buildRegistry,
  createDefaultStrategies,
  getSharedRegistry,
} from './registry.js';
export type { StrategyDefaultsOptions, StrategyRegistryOptions } from './registry.js';
export { SetFixedValueStrategy } from './set-fixed-value.js';
export { SetValueStrategy, readEventValue } from './set-value.js';
export { ExtractValueStrategy } from './extract-value.js';
export { DatetimeNowStrategy } from './datetime-now.js';
export { EntityDataStrategy } from './entity-data.js';
export { ContextValueStrategy, ENTITY_NAME_KEY } from './context-value.js';
export { TimeDifferenceStrategy } from './time-difference.js';
