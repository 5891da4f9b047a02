/**
 * Verze balíčku - načtená z package.json.
 */

import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

function loadVersion(): string {
  try {
    const here = dirname(fileURLToPath(import.meta.url));
    // src/ i dist/ leží o úroveň níž než package.json
    const packagePath = resolve(here, '../package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
      && typeof packageJson.version === 'string') {
      return packageJson.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export const version = loadVersion();
