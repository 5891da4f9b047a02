/**
 * Error hierarchy.
 *
 * Every error carries a stable `code` and optional `details`, and maps onto
 * an HTTP status through `statusCode`, so the API error handler and the CLI
 * can shape it without knowing the concrete class.
 *
 * @module
 */

import type { ValidationIssue } from '../validation/types.js';

export class RulepathError extends Error {
  readonly statusCode: number = 500;
  readonly code: string = 'RULEPATH_ERROR';
  readonly details?: unknown;

  constructor(message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RulepathError';
    this.details = details;
  }
}

/** Missing or invalid rule, service or query configuration. */
export class ConfigurationError extends RulepathError {
  override readonly statusCode = 422;
  override readonly code = 'CONFIGURATION_ERROR';
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message, issues.length > 0 ? issues : undefined);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/** A strategy threw while computing a value. Logged by the caller, never propagated. */
export class StrategyExecutionError extends RulepathError {
  override readonly code = 'STRATEGY_EXECUTION_ERROR';
  readonly strategy: string;
  readonly field: string;

  constructor(strategy: string, field: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Strategy '${strategy}' failed for field '${field}': ${reason}`, { strategy, field }, { cause });
    this.name = 'StrategyExecutionError';
    this.strategy = strategy;
    this.field = field;
  }
}

/** Entity invariants violated during build(). */
export class EntityValidationError extends RulepathError {
  override readonly statusCode = 422;
  override readonly code = 'VALIDATION_ERROR';
  readonly field: string;

  constructor(field: string, message: string) {
    super(message, { field });
    this.name = 'EntityValidationError';
    this.field = field;
  }
}

/** Inbound queue record could not be decoded. */
export class RecordParseError extends RulepathError {
  override readonly statusCode = 400;
  override readonly code = 'RECORD_PARSE_ERROR';

  constructor(message: string, cause?: unknown) {
    super(message, undefined, { cause });
    this.name = 'RecordParseError';
  }
}

/** A persistence collaborator failed. */
export class RepositoryError extends RulepathError {
  override readonly statusCode = 502;
  override readonly code = 'REPOSITORY_ERROR';
  readonly operation: string;

  constructor(operation: string, message: string, cause?: unknown) {
    super(message, { operation }, { cause });
    this.name = 'RepositoryError';
    this.operation = operation;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
