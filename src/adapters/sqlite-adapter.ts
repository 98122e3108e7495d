/**
 * TrustSQL SQLite Adapter (better-sqlite3)
 *
 * better-sqlite3 is synchronous; the adapter keeps the async interface so the
 * TrustSQL pipeline is the same for every backend.
 */

import Database from 'better-sqlite3';
import type { DriverAdapter, RowVisitor } from './adapter.js';
import { toRecord } from './adapter.js';
import { connectionClosedError } from '../errors.js';
import type { Driver, DriverResult, SqlDialect } from '../types.js';

/** sqlite::memory:, sqlite:app.db, sqlite://app.db, file:app.db or :memory: */
export function sqliteFilename(uri: string): string {
  if (uri === ':memory:') return uri;
  const path = uri.replace(/^(?:sqlite|file):(?:\/\/)?/, '');
  return path === '' ? ':memory:' : path;
}

export class SqliteAdapter implements DriverAdapter {
  readonly dialect: SqlDialect = 'sqlite';
  readonly driver: Driver = 'better-sqlite3';

  private uri: string;
  private db: Database.Database | null = null;

  constructor(uri: string) {
    this.uri = uri;
  }

  async connect(): Promise<void> {
    this.db = new Database(sqliteFilename(this.uri));
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  async run(sql: string): Promise<DriverResult> {
    const stmt = this.open('rows').prepare(sql);
    if (stmt.reader) {
      const rows = stmt.all().map(toRecord);
      return { rows, rowCount: rows.length };
    }
    const info = stmt.run();
    return { rows: [], rowCount: info.changes };
  }

  async runScript(sql: string): Promise<void> {
    this.open('execute').exec(sql);
  }

  /** Steps the statement one row at a time; leaving the loop finalizes it. */
  async iterate(sql: string, visit: RowVisitor): Promise<number> {
    const stmt = this.open('iterate').prepare(sql);
    if (!stmt.reader) {
      stmt.run();
      return 0;
    }
    let visited = 0;
    for (const row of stmt.iterate()) {
      visited++;
      if (!visit(toRecord(row))) break;
    }
    return visited;
  }

  private open(operation: string): Database.Database {
    if (!this.db) throw connectionClosedError(this.dialect, operation);
    return this.db;
  }
}
