/**
 * Výstup CLI: data na stdout, chyby na stderr, barvy jen tam, kde je terminál.
 */

import type { OutputFormat, FormattableData } from '../types.js';
import { createFormatter } from '../formatters/index.js';

interface OutputState {
  quiet: boolean;
  noColor: boolean;
  format: OutputFormat;
}

const state: OutputState = {
  quiet: false,
  noColor: false,
  format: 'pretty'
};

export function setOutputOptions(options: Partial<OutputState>): void {
  Object.assign(state, options);
}

export function getOutputOptions(): OutputState {
  return { ...state };
}

/** SGR kódy */
const ANSI = {
  bold: 1,
  dim: 2,
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  magenta: 35,
  cyan: 36
} as const;

export type ColorName = keyof typeof ANSI;

/** `--no-color` a `NO_COLOR` vypínají barvy, `FORCE_COLOR` je zapíná i mimo TTY. */
export function supportsColor(env: NodeJS.ProcessEnv = process.env): boolean {
  if (state.noColor || env['NO_COLOR'] !== undefined) return false;
  return env['FORCE_COLOR'] !== undefined || process.stdout.isTTY === true;
}

export function paint(text: string, color: ColorName, enabled: boolean): string {
  return enabled ? `\x1b[${ANSI[color]}m${text}\x1b[0m` : text;
}

function marked(symbol: string, color: ColorName, tintMessage: boolean): (message: string) => string {
  return (message) => {
    const enabled = supportsColor();
    return `${paint(symbol, color, enabled)} ${tintMessage ? paint(message, color, enabled) : message}`;
  };
}

export const success = marked('✓', 'green', false);
export const warning = marked('⚠', 'yellow', true);
export const info = marked('ℹ', 'blue', false);

export function print(message: string): void {
  if (!state.quiet) console.log(message);
}

export function printError(message: string): void {
  console.error(message);
}

/** Chyby se vypisují i v tichém režimu. */
export function printData(data: FormattableData): void {
  const isError = data.type === 'error';
  if (state.quiet && !isError) return;

  const output = createFormatter(state.format, supportsColor()).format(data);
  if (isError) {
    printError(output);
  } else {
    print(output);
  }
}
