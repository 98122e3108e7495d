/**
 * TrustSQL PostgreSQL Adapter (pg)
 *
 * Statements go over the simple query protocol (no bind parameters), which
 * accepts several statements in one string. pg then resolves to one result
 * per statement; run() reports the last.
 */

import pg from 'pg';
import type { Client } from 'pg';
import type { DriverAdapter, RowVisitor } from './adapter.js';
import { toRecord, visitRows } from './adapter.js';
import { connectionClosedError } from '../errors.js';
import type { Driver, DriverResult, SqlDialect } from '../types.js';

function toDriverResult(result: unknown): DriverResult {
  const last: unknown = Array.isArray(result) ? result[result.length - 1] : result;
  if (typeof last !== 'object' || last === null) return { rows: [], rowCount: 0 };

  const rows: unknown = Reflect.get(last, 'rows');
  const rowCount: unknown = Reflect.get(last, 'rowCount');
  const command: unknown = Reflect.get(last, 'command');

  const records = Array.isArray(rows) ? rows.map(toRecord) : [];
  if (command === 'SELECT' || records.length > 0) {
    return { rows: records, rowCount: records.length };
  }
  return { rows: records, rowCount: typeof rowCount === 'number' ? rowCount : 0 };
}

export class PostgresAdapter implements DriverAdapter {
  readonly dialect: SqlDialect = 'postgres';
  readonly driver: Driver = 'pg';

  private uri: string;
  private client: Client | null = null;

  constructor(uri: string) {
    this.uri = uri;
  }

  async connect(): Promise<void> {
    const client = new pg.Client({ connectionString: this.uri });
    await client.connect();
    this.client = client;
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    await client?.end();
  }

  async run(sql: string): Promise<DriverResult> {
    const result: unknown = await this.open('rows').query(sql);
    return toDriverResult(result);
  }

  async runScript(sql: string): Promise<void> {
    await this.open('execute').query(sql);
  }

  async iterate(sql: string, visit: RowVisitor): Promise<number> {
    const { rows } = await this.run(sql);
    return visitRows(rows, visit);
  }

  private open(operation: string): Client {
    if (!this.client) throw connectionClosedError(this.dialect, operation);
    return this.client;
  }
}
