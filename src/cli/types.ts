/**
 * CLI typy pro rulepath.
 */

import type { ValidationIssue } from '../validation/types.js';
import type { ResolveResult } from '../utils/path-resolver.js';
import type { EntityRecord } from '../types/entity.js';
import type { RuleEvaluation } from '../core/rule-engine.js';
import type { PreviewQuery } from '../core/event-processor.js';

/** Podporované výstupní formáty */
export type OutputFormat = 'json' | 'pretty';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'pretty'];

/** Exit kódy CLI */
export const ExitCode = {
  Success: 0,
  GeneralError: 1,
  InvalidArguments: 2,
  ValidationError: 3,
  FileNotFound: 4
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Globální CLI options */
export interface GlobalOptions {
  format: OutputFormat;
  quiet: boolean;
  noColor: boolean;
  settings: string | undefined;
}

/** Výsledek validace pro zobrazení */
export interface ValidateOutput {
  file: string;
  valid: boolean;
  consumerCount: number;
  errorCount: number;
  warningCount: number;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

export interface ResolveOutput {
  path: string;
  file: string;
  result: ResolveResult;
}

export interface PreviewOutput {
  file: string;
  entity: EntityRecord;
  rules: RuleEvaluation[];
  queries: PreviewQuery[];
}

/** Formátovatelná data pro výstup */
export type FormattableData =
  | { type: 'validation'; data: ValidateOutput }
  | { type: 'resolution'; data: ResolveOutput }
  | { type: 'preview'; data: PreviewOutput }
  | { type: 'message'; data: string; meta?: Record<string, unknown> }
  | { type: 'error'; data: string; meta?: Record<string, unknown> };
