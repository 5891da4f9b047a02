import type { FastifyServerOptions } from 'fastify';
import type { LevelWithSilent } from 'pino';

export interface ServerConfig {
  /** Port, na kterém server naslouchá (výchozí: 3000) */
  port: number;

  /** Host address (výchozí: '0.0.0.0') */
  host: string;

  /** Prefix pro API endpoints (výchozí: '/api/v1') */
  apiPrefix: string;

  /**
   * Logování requestů.
   *
   * - `true` - zapnout s úrovní `info`
   * - `false` - vypnout
   * - úroveň pino loggeru
   *
   * Výchozí: true
   */
  logger: boolean | LevelWithSilent;

  /** Maximální velikost těla requestu v bajtech (výchozí: 1 MiB) */
  bodyLimit: number;

  /** Dodatečné Fastify options */
  fastifyOptions: Omit<FastifyServerOptions, 'logger' | 'bodyLimit'> | undefined;
}

export type ServerConfigInput = Partial<ServerConfig>;

export function resolveConfig(input: ServerConfigInput = {}): ServerConfig {
  return {
    port: input.port ?? 3000,
    host: input.host ?? '0.0.0.0',
    apiPrefix: input.apiPrefix ?? '/api/v1',
    logger: input.logger ?? true,
    bodyLimit: input.bodyLimit ?? 1_048_576,
    fastifyOptions: input.fastifyOptions
  };
}

/** Fastify `logger` option for the configured logging. */
export function resolveLoggerOption(logger: boolean | LevelWithSilent): boolean | { level: LevelWithSilent; name: string } {
  if (typeof logger === 'boolean') {
    return logger ? { level: 'info', name: 'rulepath' } : false;
  }
  return { level: logger, name: 'rulepath' };
}
