/**
 * Příkaz validate pro CLI.
 * Validuje konfiguraci konzumentů ze souboru (JSON nebo YAML).
 */

import type { GlobalOptions, ValidateOutput } from '../types.js';
import { ConfigValidator } from '../../validation/config-validator.js';
import { isObject } from '../../validation/types.js';
import { loadDataFile } from '../utils/file-loader.js';
import { ValidationError } from '../utils/errors.js';
import { printData, print, warning } from '../utils/output.js';

/** Options pro příkaz validate */
export interface ValidateOptions extends GlobalOptions {
  strict: boolean;
}

/** Počet konzumentů v dokumentu (obě podporované podoby). */
function countConsumers(data: unknown): number {
  if (Array.isArray(data)) {
    return data.length;
  }
  if (isObject(data) && Array.isArray(data['consumers'])) {
    return data['consumers'].length;
  }
  return 0;
}

/**
 * Akce příkazu validate.
 */
export async function validateCommand(file: string, options: ValidateOptions): Promise<ValidateOutput> {
  const { data, path } = loadDataFile(file);
  const result = new ConfigValidator().validate(data);

  const output: ValidateOutput = {
    file: path,
    valid: result.valid,
    consumerCount: countConsumers(data),
    errorCount: result.errors.length,
    warningCount: result.warnings.length,
    errors: result.errors,
    warnings: result.warnings
  };

  printData({ type: 'validation', data: output });

  if (!result.valid) {
    throw new ValidationError(
      `Validation failed with ${result.errors.length} error(s)`,
      result.errors
    );
  }

  // Ve strict módu vedou i varování k nenulovému exit kódu
  if (options.strict && result.warnings.length > 0) {
    print('');
    print(warning('Strict mode: warnings treated as errors'));
    throw new ValidationError(
      `Strict validation failed with ${result.warnings.length} warning(s)`,
      result.warnings
    );
  }

  return output;
}
