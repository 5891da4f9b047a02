/**
 * CLI chybové třídy.
 */

import { ExitCode } from '../types.js';
import type { ValidationIssue } from '../../validation/types.js';
import { ConfigurationError } from '../../errors/index.js';
import { ConfigLoadError } from '../../config/loader.js';

/** Základní CLI chyba */
export class CliError extends Error {
  public readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode = ExitCode.GeneralError, cause?: unknown) {
    super(message, { cause });
    this.name = 'CliError';
    this.exitCode = exitCode;
  }
}

/** Chyba validace argumentů */
export class InvalidArgumentsError extends CliError {
  constructor(message: string, cause?: unknown) {
    super(message, ExitCode.InvalidArguments, cause);
    this.name = 'InvalidArgumentsError';
  }
}

/** Soubor nenalezen */
export class FileNotFoundError extends CliError {
  public readonly filePath: string;

  constructor(filePath: string, cause?: unknown) {
    super(`File not found: ${filePath}`, ExitCode.FileNotFound, cause);
    this.name = 'FileNotFoundError';
    this.filePath = filePath;
  }
}

/** Chyba validace konfigurace */
export class ValidationError extends CliError {
  public readonly errors: ValidationIssue[];

  constructor(message: string, errors: ValidationIssue[] = [], cause?: unknown) {
    super(message, ExitCode.ValidationError, cause);
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

/** Získá exit kód z chyby */
export function getExitCode(error: unknown): ExitCode {
  if (error instanceof CliError) {
    return error.exitCode;
  }
  if (error instanceof ConfigurationError || error instanceof ConfigLoadError) {
    return ExitCode.ValidationError;
  }
  return ExitCode.GeneralError;
}

function formatIssues(issues: readonly ValidationIssue[]): string {
  return issues.map((e) => `  ${e.severity === 'error' ? '✗' : '⚠'} ${e.path}: ${e.message}`).join('\n');
}

/** Formátuje chybu pro výstup */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError && error.errors.length > 0) {
    return `${error.message}\n${formatIssues(error.errors)}`;
  }
  if (error instanceof ConfigurationError && error.issues.length > 0) {
    return `${error.message}\n${formatIssues(error.issues)}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
