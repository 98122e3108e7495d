/**
 * TrustSQL Logger: Structured statement logging
 *
 * Emits statement events with timing and receipt, and the reconstructed SQL
 * when verbose.
 */

import type { StatementReceipt } from './types.js';
import type { TrustSQLEventEmitter } from './events.js';

export interface LoggerConfig {
  enabled: boolean;
  verbose: boolean;
  slowQueryMs: number;
}

export class TrustSQLLogger {
  private config: LoggerConfig;
  private emitter: TrustSQLEventEmitter;

  constructor(config: LoggerConfig, emitter: TrustSQLEventEmitter) {
    this.config = config;
    this.emitter = emitter;
  }

  logStatement(receipt: StatementReceipt, sql: string): void {
    if (!this.config.enabled) return;

    this.emitter.emit('statement', {
      operation: receipt.operation,
      durationMs: receipt.duration,
      receipt,
      ...(this.config.verbose ? { sql } : {}),
    });

    if (receipt.duration >= this.config.slowQueryMs) {
      this.emitter.emit('slow-statement', {
        operation: receipt.operation,
        durationMs: receipt.duration,
        threshold: this.config.slowQueryMs,
      });
    }
  }
}
