/**
 * Consumer configuration loader.
 *
 * Accepts JSON or YAML (YAML is a superset, so one parser covers both) in
 * two shapes:
 * - an array of consumer documents
 * - an object `{ version?, consumers, extensions? }`
 *
 * @example
 * ```typescript
 * const config = await loadConfigFromFile('./consumers.yaml');
 * const processor = new EventProcessor({ config });
 * ```
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import type { SystemConfig } from '../types/config.js';
import { ConfigurationError, RulepathError } from '../errors/index.js';
import { ConfigValidator } from '../validation/config-validator.js';
import type { ValidationIssue } from '../validation/types.js';
import { normalizeConfig } from './normalize.js';

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

/** Syntax or I/O failure; validation problems raise {@link ConfigurationError}. */
export class ConfigLoadError extends RulepathError {
  override readonly statusCode = 400;
  override readonly code = 'CONFIG_LOAD_ERROR';

  constructor(message: string, readonly filePath?: string | undefined, cause?: unknown) {
    super(filePath ? `${filePath}: ${message}` : message, filePath ? { filePath } : undefined, { cause });
    this.name = 'ConfigLoadError';
  }
}

export interface LoadedConfig {
  config: SystemConfig;
  warnings: ValidationIssue[];
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Parses without validating. */
export function parseConfigDocument(content: string, filePath?: string): unknown {
  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (err) {
    throw new ConfigLoadError(
      `Syntax error: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      err,
    );
  }

  if (parsed === null || parsed === undefined) {
    throw new ConfigLoadError('Configuration is empty', filePath);
  }
  return parsed;
}

/**
 * Parses, validates and normalises a configuration document.
 *
 * @throws {ConfigLoadError} Syntax error or empty input
 * @throws {ConfigurationError} Validation errors, carried in `issues`
 */
export function parseConfigText(content: string, filePath?: string): LoadedConfig {
  const parsed = parseConfigDocument(content, filePath);

  const result = new ConfigValidator().validate(parsed);
  if (!result.valid) {
    const first = result.errors[0];
    const summary = first ? `${first.path}: ${first.message}` : 'unknown error';
    const extra = result.errors.length > 1 ? ` (and ${result.errors.length - 1} more)` : '';
    throw new ConfigurationError(
      `Invalid configuration${filePath ? ` in ${filePath}` : ''}: ${summary}${extra}`,
      result.errors,
    );
  }

  return { config: normalizeConfig(parsed), warnings: result.warnings };
}

export async function loadConfigFromFile(filePath: string): Promise<LoadedConfig> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigLoadError(
      `Failed to read file: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      err,
    );
  }

  return parseConfigText(content, filePath);
}
