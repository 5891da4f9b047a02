import type { JsonObject } from '../types/json.js';
import type { SqlValue } from '../query/parameter-extraction-service.js';

export type Row = JsonObject;

/**
 * Relational database seen from the pipeline: run a statement, fetch rows.
 */
export interface PersistenceGateway {
  execute(query: string, params: readonly SqlValue[]): Promise<boolean>;
  fetch(query: string, params: readonly SqlValue[]): Promise<Row[]>;
  /** Reachability check for health reporting. */
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export interface RecordedStatement {
  query: string;
  params: SqlValue[];
}

type RowMatcher = (query: string, params: readonly SqlValue[]) => boolean;

export interface InMemoryGatewayOptions {
  /** Statements kept per list; the oldest are dropped past it. Unbounded when omitted. */
  maxRecorded?: number;
}

/**
 * Gateway held in memory: records every statement and answers fetches from
 * scripted responses. Used by tests and by `serve` without a database.
 */
export class InMemoryPersistenceGateway implements PersistenceGateway {
  readonly executed: RecordedStatement[] = [];
  readonly fetched: RecordedStatement[] = [];
  private readonly responses: Array<{ matches: RowMatcher; rows: Row[] }> = [];
  private failure: Error | undefined;
  private closed = false;
  private readonly maxRecorded: number;

  constructor(options: InMemoryGatewayOptions = {}) {
    this.maxRecorded = options.maxRecorded ?? Number.POSITIVE_INFINITY;
  }

  /** Rows returned for fetches whose query contains `fragment` (or satisfies the matcher). */
  respondWith(fragment: string | RowMatcher, rows: Row[]): this {
    const matches: RowMatcher = typeof fragment === 'string'
      ? (query) => query.includes(fragment)
      : fragment;
    this.responses.push({ matches, rows });
    return this;
  }

  /** Makes every following call reject with `error`; `undefined` clears it. */
  failWith(error: Error | undefined): this {
    this.failure = error;
    return this;
  }

  async execute(query: string, params: readonly SqlValue[]): Promise<boolean> {
    this.assertUsable();
    this.record(this.executed, query, params);
    return true;
  }

  async fetch(query: string, params: readonly SqlValue[]): Promise<Row[]> {
    this.assertUsable();
    this.record(this.fetched, query, params);
    const response = this.responses.find((candidate) => candidate.matches(query, params));
    return response === undefined ? [] : response.rows.map((row) => ({ ...row }));
  }

  async ping(): Promise<boolean> {
    return !this.closed && this.failure === undefined;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private record(list: RecordedStatement[], query: string, params: readonly SqlValue[]): void {
    if (this.maxRecorded <= 0) return;
    list.push({ query, params: [...params] });
    if (list.length > this.maxRecorded) {
      list.splice(0, list.length - this.maxRecorded);
    }
  }

  private assertUsable(): void {
    if (this.failure !== undefined) {
      throw this.failure;
    }
    if (this.closed) {
      throw new Error('Gateway is closed');
    }
  }
}
