/**
 * Utility pro načítání souborů.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import { FileNotFoundError, ValidationError } from './errors.js';

/** Výsledek načtení souboru */
export interface LoadResult<T = unknown> {
  data: T;
  path: string;
}

/**
 * Načte textový soubor.
 * @throws FileNotFoundError pokud soubor neexistuje
 */
export function readTextFile(filePath: string): LoadResult<string> {
  const absolutePath = resolve(filePath);

  if (!existsSync(absolutePath)) {
    throw new FileNotFoundError(filePath);
  }

  return { data: readFileSync(absolutePath, 'utf-8'), path: absolutePath };
}

/**
 * Načte a parsuje JSON nebo YAML soubor.
 * @throws FileNotFoundError pokud soubor neexistuje
 * @throws ValidationError pokud obsah nejde parsovat
 */
export function loadDataFile(filePath: string): LoadResult {
  const { data: content, path } = readTextFile(filePath);

  try {
    return { data: parse(content), path };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Invalid JSON or YAML in file: ${message}`);
  }
}

/**
 * Zkontroluje, zda soubor existuje.
 */
export function fileExists(filePath: string): boolean {
  return existsSync(resolve(filePath));
}
