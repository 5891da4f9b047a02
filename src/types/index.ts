export * from './json.js';
export * from './condition.js';
export * from './action.js';
export * from './rule.js';
export * from './parameter.js';
export * from './config.js';
export * from './entity.js';
