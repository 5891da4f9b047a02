/**
 * PostgreSQL gateway on a pg pool.
 *
 * Configured queries use `%s` positional markers; they are rewritten to
 * pg's `$1, $2, ...` before execution. Queries already written with `$n`
 * pass through unchanged.
 */

import pg from 'pg';
import { toJsonValue, isJsonObject } from '../types/json.js';
import type { SqlValue } from '../query/parameter-extraction-service.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { PersistenceGateway, Row } from './gateway.js';

export interface PgGatewayOptions {
  connectionString?: string;
  pool?: pg.Pool;
  max?: number;
  logger?: Logger;
}

export function toPgPlaceholders(query: string): string {
  let position = 0;
  return query.replace(/%s/g, () => `$${++position}`);
}

export class PgPersistenceGateway implements PersistenceGateway {
  private readonly pool: pg.Pool;
  private readonly logger: Logger;

  constructor(options: PgGatewayOptions = {}) {
    this.pool = options.pool ?? new pg.Pool({
      connectionString: options.connectionString,
      max: options.max ?? 10,
    });
    this.logger = options.logger ?? silentLogger;
  }

  async execute(query: string, params: readonly SqlValue[]): Promise<boolean> {
    const result = await this.pool.query(toPgPlaceholders(query), [...params]);
    this.logger.debug({ rowCount: result.rowCount }, 'Statement executed');
    return true;
  }

  async fetch(query: string, params: readonly SqlValue[]): Promise<Row[]> {
    const result = await this.pool.query<Record<string, unknown>>(toPgPlaceholders(query), [...params]);
    const rows: Row[] = [];
    for (const row of result.rows) {
      const converted = toJsonValue(row);
      if (converted !== undefined && isJsonObject(converted)) {
        rows.push(converted);
      }
    }
    return rows;
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (err) {
      this.logger.warn({ err }, 'Database ping failed');
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
