/**
 * Process settings: `.rulepath.json` merged over defaults, then overridden
 * by environment variables.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import type { LevelWithSilent } from 'pino';
import type { MergePolicy } from '../types/rule.js';
import { isMergePolicy } from '../validation/constants.js';
import { isObject } from '../validation/types.js';

export const SETTINGS_FILENAME = '.rulepath.json';

export interface Settings {
  /** Consumer configuration file (JSON or YAML). */
  configPath: string | undefined;
  logLevel: LevelWithSilent;
  server: {
    host: string;
    port: number;
  };
  databaseUrl: string | undefined;
  /** How long a loaded consumer configuration is reused, in milliseconds. */
  configCacheTtlMs: number;
  mergePolicy: MergePolicy;
}

export const DEFAULT_SETTINGS: Settings = {
  configPath: undefined,
  logLevel: 'info',
  server: {
    host: '0.0.0.0',
    port: 3000,
  },
  databaseUrl: undefined,
  configCacheTtlMs: 60_000,
  mergePolicy: 'overwrite',
};

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

type Env = Readonly<Record<string, string | undefined>>;

/** Hledá konfigurační soubor v hierarchii adresářů, pak v home adresáři */
export function findSettingsFile(startDir: string): string | null {
  let currentDir = startDir;

  while (true) {
    const settingsPath = join(currentDir, SETTINGS_FILENAME);
    if (existsSync(settingsPath)) {
      return settingsPath;
    }

    const parentDir = resolve(currentDir, '..');
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  const homeSettings = join(homedir(), SETTINGS_FILENAME);
  if (existsSync(homeSettings)) {
    return homeSettings;
  }

  return null;
}

/** Reads the known keys of a settings document; unknown keys are ignored. */
export function parseSettings(content: string, filePath: string): Partial<Settings> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid settings in ${filePath}: ${message}`);
  }
  if (!isObject(parsed)) {
    throw new Error(`Invalid settings in ${filePath}: settings must be an object`);
  }

  const server = isObject(parsed['server']) ? parsed['server'] : {};
  const result: Partial<Settings> = {};

  if (typeof parsed['configPath'] === 'string') {
    // Relative paths are relative to the settings file
    result.configPath = resolve(filePath, '..', parsed['configPath']);
  }
  const logLevel = parsed['logLevel'];
  if (typeof logLevel === 'string') result.logLevel = toLogLevel(logLevel);
  if (typeof parsed['databaseUrl'] === 'string') result.databaseUrl = parsed['databaseUrl'];
  if (typeof parsed['configCacheTtlMs'] === 'number') result.configCacheTtlMs = parsed['configCacheTtlMs'];
  const mergePolicy = parsed['mergePolicy'];
  if (typeof mergePolicy === 'string' && isMergePolicy(mergePolicy)) result.mergePolicy = mergePolicy;
  result.server = {
    host: typeof server['host'] === 'string' ? server['host'] : DEFAULT_SETTINGS.server.host,
    port: typeof server['port'] === 'number' ? server['port'] : DEFAULT_SETTINGS.server.port,
  };

  return result;
}

/** Environment wins over the settings file. */
export function applyEnv(settings: Settings, env: Env): Settings {
  const port = toInteger(env['PORT']);
  const ttl = toInteger(env['CONFIG_CACHE_TTL']);
  const logLevel = env['LOG_LEVEL'];

  return {
    configPath: env['RULEPATH_CONFIG'] ? resolve(env['RULEPATH_CONFIG']) : settings.configPath,
    logLevel: logLevel ? toLogLevel(logLevel) : settings.logLevel,
    server: {
      host: env['HOST'] || settings.server.host,
      port: port ?? settings.server.port,
    },
    databaseUrl: env['DATABASE_URL'] || settings.databaseUrl,
    configCacheTtlMs: ttl ?? settings.configCacheTtlMs,
    mergePolicy: settings.mergePolicy,
  };
}

let cachedSettings: Settings | null = null;
let cachedSettingsPath: string | null = null;

/**
 * Načte nastavení.
 *
 * Priorita:
 * 1. Proměnné prostředí
 * 2. Explicitně zadaný soubor
 * 3. `.rulepath.json` v aktuálním adresáři, jeho rodičích nebo home adresáři
 * 4. Výchozí hodnoty
 */
export function loadSettings(explicitPath?: string, env: Env = process.env): Settings {
  const pathToLoad = explicitPath ? resolve(explicitPath) : findSettingsFile(process.cwd());

  if (cachedSettings && cachedSettingsPath === pathToLoad) {
    return cachedSettings;
  }

  let fileSettings: Partial<Settings> = {};
  if (pathToLoad && existsSync(pathToLoad)) {
    fileSettings = parseSettings(readFileSync(pathToLoad, 'utf-8'), pathToLoad);
  } else if (explicitPath) {
    throw new Error(`Settings file not found: ${pathToLoad}`);
  }

  cachedSettings = applyEnv({ ...DEFAULT_SETTINGS, ...fileSettings }, env);
  cachedSettingsPath = pathToLoad;
  return cachedSettings;
}

/** Resetuje cache nastavení (pro testování) */
export function resetSettingsCache(): void {
  cachedSettings = null;
  cachedSettingsPath = null;
}

function toLogLevel(value: string): LevelWithSilent {
  const normalized = value.toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? DEFAULT_SETTINGS.logLevel;
}

function toInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : undefined;
}
