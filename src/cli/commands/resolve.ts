/**
 * Příkaz resolve pro CLI.
 * Vyhodnotí tečkovou cestu nad eventem ze souboru.
 */

import type { GlobalOptions, ResolveOutput } from '../types.js';
import { toJsonValue } from '../../types/json.js';
import { unflatten } from '../../utils/flatten.js';
import { resolvePath } from '../../utils/path-resolver.js';
import { loadDataFile } from '../utils/file-loader.js';
import { InvalidArgumentsError, ValidationError } from '../utils/errors.js';
import { printData } from '../utils/output.js';

export type ResolveOptions = GlobalOptions;

export async function resolveCommand(
  path: string,
  eventFile: string,
  _options: ResolveOptions
): Promise<ResolveOutput> {
  const { data, path: file } = loadDataFile(eventFile);
  const event = toJsonValue(data);
  if (event === undefined) {
    throw new ValidationError(`Event file does not contain JSON data: ${eventFile}`);
  }

  const result = resolvePath(path, unflatten(event));
  const output: ResolveOutput = { path, file, result };
  printData({ type: 'resolution', data: output });

  if (result.status === 'error') {
    throw new InvalidArgumentsError(result.error);
  }
  return output;
}
