import { vi } from 'vitest';
import type { GlobalOptions } from '../../../../src/cli/types.js';

export const globalOptions: GlobalOptions = {
  format: 'json',
  quiet: false,
  noColor: true,
  settings: undefined,
};

/** JSON printed by the command through the mocked console.log. */
export function printedJson(call = 0): unknown {
  const output: unknown = vi.mocked(console.log).mock.calls[call]?.[0];
  return typeof output === 'string' ? JSON.parse(output) : undefined;
}
