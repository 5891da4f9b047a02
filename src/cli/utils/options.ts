/**
 * Čtení options z CAC, které je předává jako `Record<string, unknown>`.
 */

import { OUTPUT_FORMATS, type OutputFormat } from '../types.js';
import { InvalidArgumentsError } from './errors.js';

export type RawOptions = Record<string, unknown>;

export function stringOption(options: RawOptions, key: string): string | undefined {
  const value = options[key];
  if (value === undefined) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  throw new InvalidArgumentsError(`Option --${key} expects a value`);
}

export function booleanOption(options: RawOptions, key: string, fallback: boolean): boolean {
  const value = options[key];
  return typeof value === 'boolean' ? value : fallback;
}

export function integerOption(options: RawOptions, key: string): number | undefined {
  const raw = options[key];
  if (raw === undefined) return undefined;
  const value = typeof raw === 'number' ? raw : Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentsError(`Option --${key} expects a non-negative integer`);
  }
  return value;
}

export function formatOption(options: RawOptions): OutputFormat | undefined {
  const value = stringOption(options, 'format');
  if (value === undefined) return undefined;
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value);
  if (format === undefined) {
    throw new InvalidArgumentsError(`Unknown format: ${value}. Use one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return format;
}
