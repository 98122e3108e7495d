/**
 * TrustSQL Statement Receipts: Structured execution results
 *
 * Every execute() returns a StatementReceipt. Never void. Never driver-specific.
 */

import type { SqlDialect, StatementOperation, StatementReceipt } from './types.js';

export function createReceipt(opts: {
  operation: StatementOperation;
  dialect: SqlDialect;
  startTime: number;
  rowCount?: number;
  success?: boolean;
}): StatementReceipt {
  return {
    operation: opts.operation,
    dialect: opts.dialect,
    success: opts.success ?? true,
    rowCount: opts.rowCount ?? 0,
    duration: Date.now() - opts.startTime,
  };
}
