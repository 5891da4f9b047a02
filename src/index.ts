// Types
export * from './types/index.js';

// Errors
export {
  RulepathError,
  ConfigurationError,
  StrategyExecutionError,
  EntityValidationError,
  RecordParseError,
  RepositoryError,
  errorMessage,
} from './errors/index.js';

// Core
export { Entity } from './core/entity.js';
export type { EntityInit } from './core/entity.js';
export { EntityBuilder } from './core/entity-builder.js';
export type { CorrelationLookup, EntityBuilderOptions } from './core/entity-builder.js';
export { BusinessRule } from './core/business-rule.js';
export { RuleEngine } from './core/rule-engine.js';
export type { RuleEngineOptions, RuleEvaluation } from './core/rule-engine.js';
export { ExtractionContext, readIdentifier, readCorrelationId } from './core/extraction-context.js';
export type { ExtractionContextInit } from './core/extraction-context.js';
export { EVENT_PATHS, CORRELATION_DOCUMENT_PATHS } from './core/event-paths.js';
export { parseRecord } from './core/record-parser.js';
export type { ParsedRecord } from './core/record-parser.js';
export { EventProcessor, createEventProcessor, processBatch } from './core/event-processor.js';
export type {
  EventProcessorOptions,
  PipelineOptions,
  ProcessOutcome,
  PreviewResult,
  PreviewQuery,
  BatchItemResult,
} from './core/event-processor.js';

// Evaluation
export { ConditionEvaluator } from './evaluation/condition-evaluator.js';
export type { ConditionEvaluationResult, EvaluationOptions } from './evaluation/condition-evaluator.js';
export { ActionExecutor } from './evaluation/action-executor.js';
export type { ActionResult } from './evaluation/action-executor.js';

// Strategies, queries, persistence
export * from './strategies/index.js';
export * from './query/index.js';
export * from './persistence/index.js';

// Configuration
export * from './config/index.js';
export * from './validation/index.js';

// Utils
export { PathResolver, resolvePath, extractSelected, splitPath, walkShape, buildStructuredQuery } from './utils/path-resolver.js';
export type { ResolveResult, ShapeLevel, ShapeWalk, PathResolverOptions } from './utils/path-resolver.js';
export { unflatten, isFlattened } from './utils/flatten.js';
export { formatDate, parseTimestamp, DEFAULT_DATE_FORMAT } from './utils/date-format.js';
export { evaluateCondition } from './utils/operators.js';
export { searchJson } from './utils/json-query.js';
export type { QueryFn } from './utils/json-query.js';
export { createLogger, silentLogger } from './utils/logger.js';
export type { Logger, LoggerOptions } from './utils/logger.js';

// API
export * from './api/index.js';

export { version } from './version.js';
