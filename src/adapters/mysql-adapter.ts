/**
 * TrustSQL MySQL Adapter (mysql2)
 *
 * One connection per TrustSQL instance. multipleStatements is on so that
 * execute() can run a trusted script in one round trip; runtime text can never
 * add a statement because it always leaves as a single quoted literal.
 */

import mysql from 'mysql2/promise';
import type { Connection } from 'mysql2/promise';
import type { DriverAdapter, RowVisitor } from './adapter.js';
import { toRecord, visitRows } from './adapter.js';
import { connectionClosedError } from '../errors.js';
import type { Driver, DriverResult, SqlDialect } from '../types.js';

export class MysqlAdapter implements DriverAdapter {
  readonly dialect: SqlDialect = 'mysql';
  readonly driver: Driver = 'mysql2';

  private uri: string;
  private connection: Connection | null = null;

  constructor(uri: string) {
    this.uri = uri;
  }

  async connect(): Promise<void> {
    this.connection = await mysql.createConnection({ uri: this.uri, multipleStatements: true });
  }

  async close(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    await connection?.end();
  }

  async run(sql: string): Promise<DriverResult> {
    const [result] = await this.open('rows').query(sql);
    if (Array.isArray(result)) {
      const packets: unknown[] = result;
      const rows = packets.map(toRecord);
      return { rows, rowCount: rows.length };
    }
    return { rows: [], rowCount: 'affectedRows' in result ? result.affectedRows : 0 };
  }

  async runScript(sql: string): Promise<void> {
    await this.open('execute').query(sql);
  }

  async iterate(sql: string, visit: RowVisitor): Promise<number> {
    const { rows } = await this.run(sql);
    return visitRows(rows, visit);
  }

  private open(operation: string): Connection {
    if (!this.connection) throw connectionClosedError(this.dialect, operation);
    return this.connection;
  }
}
