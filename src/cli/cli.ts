/**
 * Hlavní CLI setup pomocí CAC.
 */

import { cac } from 'cac';
import { version } from '../version.js';
import type { GlobalOptions } from './types.js';
import { loadSettings } from '../config/settings.js';
import type { Settings } from '../config/settings.js';
import { setOutputOptions, printError } from './utils/output.js';
import { getExitCode, formatError } from './utils/errors.js';
import {
  booleanOption,
  formatOption,
  integerOption,
  stringOption,
  type RawOptions
} from './utils/options.js';
import { validateCommand } from './commands/validate.js';
import { resolveCommand } from './commands/resolve.js';
import { previewCommand } from './commands/preview.js';
import { serveCommand } from './commands/serve.js';

/** CLI instance */
const cli = cac('rulepath');

/**
 * Promise z běžící async akce.
 * CAC neawaituje async action handlery, awaituje se v run().
 */
let actionPromise: Promise<void> | undefined;

/** Obalí async action handler tak, aby se jeho Promise dala awaitovat v run(). */
function tracked<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => void {
  return (...args: T) => {
    actionPromise = fn(...args).catch((err: unknown) => {
      printError(formatError(err));
      process.exitCode = getExitCode(err);
    });
  };
}

/** Zpracuje globální options */
function processGlobalOptions(options: RawOptions): { global: GlobalOptions; settings: Settings } {
  const settingsPath = stringOption(options, 'settings');
  const settings = loadSettings(settingsPath);

  const global: GlobalOptions = {
    format: formatOption(options) ?? 'pretty',
    quiet: booleanOption(options, 'quiet', false),
    // cac maps --no-color onto `color: false`
    noColor: !booleanOption(options, 'color', true),
    settings: settingsPath
  };

  setOutputOptions({ format: global.format, quiet: global.quiet, noColor: global.noColor });
  return { global, settings };
}

/** Registruje globální options */
function registerGlobalOptions(): void {
  cli
    .option('-f, --format <format>', 'Output format: json, pretty')
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--settings <path>', 'Path to .rulepath.json settings file');
}

function registerValidateCommand(): void {
  cli
    .command('validate <file>', 'Validate a consumer configuration file')
    .option('--strict', 'Treat warnings as errors')
    .action(tracked(async (file: string, options: RawOptions) => {
      const { global } = processGlobalOptions(options);
      await validateCommand(file, { ...global, strict: booleanOption(options, 'strict', false) });
    }));
}

function registerResolveCommand(): void {
  cli
    .command('resolve <path> <eventFile>', 'Resolve a dotted path against an event file')
    .action(tracked(async (path: string, eventFile: string, options: RawOptions) => {
      const { global } = processGlobalOptions(options);
      await resolveCommand(path, eventFile, global);
    }));
}

function registerPreviewCommand(): void {
  cli
    .command('preview <eventFile>', 'Build the entity and queries for an event without saving')
    .option('-c, --config <file>', 'Consumer configuration file (JSON or YAML)')
    .action(tracked(async (eventFile: string, options: RawOptions) => {
      const { global, settings } = processGlobalOptions(options);
      await previewCommand(eventFile, { ...global, config: stringOption(options, 'config') }, settings);
    }));
}

function registerServeCommand(): void {
  cli
    .command('serve', 'Start the HTTP server')
    .option('-c, --config <file>', 'Consumer configuration file (JSON or YAML)')
    .option('-p, --port <port>', 'Server port')
    .option('-H, --host <host>', 'Server host')
    .action(tracked(async (options: RawOptions) => {
      const { global, settings } = processGlobalOptions(options);
      await serveCommand({
        ...global,
        config: stringOption(options, 'config'),
        port: integerOption(options, 'port'),
        host: stringOption(options, 'host')
      }, settings);
    }));
}

/** Inicializuje a spustí CLI */
export async function run(args: string[] = process.argv): Promise<void> {
  registerGlobalOptions();
  registerValidateCommand();
  registerResolveCommand();
  registerPreviewCommand();
  registerServeCommand();

  cli.help();
  cli.version(version);

  try {
    cli.parse(args);
    if (actionPromise) {
      await actionPromise;
    }
  } catch (err) {
    printError(formatError(err));
    process.exitCode = getExitCode(err);
  }
}

export { cli };
