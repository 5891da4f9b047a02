/**
 * Příkaz serve pro CLI.
 * Spustí HTTP server nad konfigurací konzumentů.
 */

import type { GlobalOptions } from '../types.js';
import type { Settings } from '../../config/settings.js';
import { ConfigService, FileConfigSource } from '../../config/config-service.js';
import { RulepathServer } from '../../api/server.js';
import { InMemoryPersistenceGateway } from '../../persistence/gateway.js';
import type { PersistenceGateway } from '../../persistence/gateway.js';
import { PgPersistenceGateway } from '../../persistence/pg-gateway.js';
import { createLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import { InvalidArgumentsError, FileNotFoundError } from '../utils/errors.js';
import { fileExists } from '../utils/file-loader.js';
import { print, success, info } from '../utils/output.js';

export interface ServeOptions extends GlobalOptions {
  config: string | undefined;
  port: number | undefined;
  host: string | undefined;
}

/** Statements a long-running in-memory gateway keeps for inspection. */
export const IN_MEMORY_RECORD_LIMIT = 100;

/** pg gateway when a database URL is configured, otherwise one held in memory. */
export function createGateway(settings: Settings, logger: Logger): PersistenceGateway {
  if (settings.databaseUrl) {
    return new PgPersistenceGateway({ connectionString: settings.databaseUrl, logger });
  }
  return new InMemoryPersistenceGateway({ maxRecorded: IN_MEMORY_RECORD_LIMIT });
}

export async function serveCommand(options: ServeOptions, settings: Settings): Promise<RulepathServer> {
  const configPath = options.config ?? settings.configPath;
  if (configPath === undefined) {
    throw new InvalidArgumentsError('No consumer configuration: pass --config or set RULEPATH_CONFIG');
  }
  if (!fileExists(configPath)) {
    throw new FileNotFoundError(configPath);
  }

  const logger = createLogger({ level: settings.logLevel });
  const configService = new ConfigService({
    source: new FileConfigSource(configPath, logger),
    ttlMs: settings.configCacheTtlMs,
    logger
  });
  // Chyby konfigurace mají zastavit start, ne první request
  await configService.getConfig();

  const gateway = createGateway(settings, logger);
  const server = await RulepathServer.start({
    server: {
      port: options.port ?? settings.server.port,
      host: options.host ?? settings.server.host,
      logger: settings.logLevel
    },
    config: configService,
    gateway,
    mergePolicy: settings.mergePolicy
  });

  print(success(`Server listening on ${server.address}`));
  print(info(settings.databaseUrl ? 'Persistence: PostgreSQL' : 'Persistence: in-memory'));

  const shutdown = (): void => {
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return server;
}
