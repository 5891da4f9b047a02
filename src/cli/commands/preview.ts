/**
 * Příkaz preview pro CLI.
 * Sestaví entitu a dotazy pro event bez ukládání.
 */

import type { GlobalOptions, PreviewOutput } from '../types.js';
import type { Settings } from '../../config/settings.js';
import { loadConfigFromFile } from '../../config/loader.js';
import { createEventProcessor } from '../../core/event-processor.js';
import { buildRegistry } from '../../strategies/registry.js';
import { fileExists, loadDataFile } from '../utils/file-loader.js';
import { FileNotFoundError, InvalidArgumentsError } from '../utils/errors.js';
import { printData, print, warning } from '../utils/output.js';

export interface PreviewOptions extends GlobalOptions {
  /** Soubor s konfigurací konzumentů (výchozí: `configPath` z nastavení) */
  config: string | undefined;
}

export async function previewCommand(
  eventFile: string,
  options: PreviewOptions,
  settings: Settings
): Promise<PreviewOutput> {
  const configPath = options.config ?? settings.configPath;
  if (configPath === undefined) {
    throw new InvalidArgumentsError('No consumer configuration: pass --config or set configPath in .rulepath.json');
  }
  if (!fileExists(configPath)) {
    throw new FileNotFoundError(configPath);
  }

  const { config, warnings } = await loadConfigFromFile(configPath);
  for (const issue of warnings) {
    print(warning(`${issue.path}: ${issue.message}`));
  }

  const { data: record, path: file } = loadDataFile(eventFile);
  const processor = createEventProcessor(config, {
    registry: buildRegistry(),
    mergePolicy: settings.mergePolicy
  });
  const preview = processor.preview(record);

  const output: PreviewOutput = {
    file,
    entity: preview.entity.toJSON(),
    rules: preview.rules,
    queries: preview.queries
  };
  printData({ type: 'preview', data: output });
  return output;
}
