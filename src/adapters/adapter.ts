/**
 * TrustSQL Driver Adapter Interface
 *
 * Every backend implements this interface. TrustSQL hands adapters finished
 * SQL text only; reconstruction and validation have already happened.
 */

import type { Driver, DriverResult, SqlDialect } from '../types.js';

export interface DriverAdapter {
  readonly dialect: SqlDialect;
  readonly driver: Driver;

  // ─── Lifecycle ────────────────────────────────────────────────────
  connect(): Promise<void>;
  close(): Promise<void>;

  // ─── Statements ───────────────────────────────────────────────────
  /** Run one statement and return its rows (empty for non-queries). */
  run(sql: string): Promise<DriverResult>;
  /** Run one or more statements, discarding any rows. */
  runScript(sql: string): Promise<void>;
  /**
   * Run one statement and hand its rows to `visit` until it returns false.
   * Resolves to the number of rows visited.
   */
  iterate(sql: string, visit: RowVisitor): Promise<number>;
}

export type RowVisitor = (record: Record<string, unknown>) => boolean;

/** Visit already-fetched rows, for drivers that buffer the whole result. */
export function visitRows(rows: Record<string, unknown>[], visit: RowVisitor): number {
  let visited = 0;
  for (const record of rows) {
    visited++;
    if (!visit(record)) break;
  }
  return visited;
}

/** Narrow a driver row to a plain record. */
export function toRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}
