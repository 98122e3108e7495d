/**
 * TrustSQL: Main class
 *
 * One instance owns one driver connection and one trust registry. SQL is
 * composed by concatenating trusted fragments (db.ow`...`, db.allowlist(),
 * db.int()) with runtime text; everything that is not a registered token is
 * sent to the database as a quoted literal.
 *
 * Pipeline per statement: reconstruct → security policy → driver → receipt.
 */

import type { DriverAdapter } from './adapters/adapter.js';
import { MysqlAdapter } from './adapters/mysql-adapter.js';
import { PostgresAdapter } from './adapters/postgres-adapter.js';
import { SqliteAdapter } from './adapters/sqlite-adapter.js';
import { resolveConfig } from './config.js';
import type { ResolvedConfig, TrustSQLConfig } from './config.js';
import { detectDialect, getDialect } from './dialect.js';
import type { Dialect } from './dialect.js';
import { TrustSQLError, connectionClosedError, leveled, mapDriverError } from './errors.js';
import { TrustSQLEventEmitter } from './events.js';
import { allowlistKey, assertBalancedFragment, assertInt64, assertSourceLiteral } from './fragment.js';
import { SecurityPolicy, checkStatement, inspect } from './guardrails.js';
import type { GuardrailContext } from './guardrails.js';
import { TrustSQLLogger } from './logger.js';
import { createReceipt } from './receipts.js';
import { reconstruct } from './reconstruct.js';
import { TrustRegistry } from './registry.js';
import { Row } from './row.js';
import type {
  AllowlistValue,
  ConnectionStatus,
  DriverResult,
  ExplainResult,
  SqlDialect,
  StatementOperation,
  StatementReceipt,
  TrustSQLEvents,
} from './types.js';

export interface OpenOptions {
  /** Use this adapter instead of the one chosen from the URI scheme. */
  adapter?: DriverAdapter;
}

export type RowCallback = (row: Row) => boolean | void;

export class TrustSQL {
  private config: ResolvedConfig;
  private dialect: Dialect;
  private adapter: DriverAdapter;
  private emitter: TrustSQLEventEmitter;
  private logger: TrustSQLLogger;
  private registry: TrustRegistry;
  private guardrails: GuardrailContext;
  private allowed = new Set<string>();
  private connectedAt: Date | null;

  private constructor(
    config: ResolvedConfig,
    dialect: Dialect,
    adapter: DriverAdapter,
    emitter: TrustSQLEventEmitter,
    logger: TrustSQLLogger,
  ) {
    this.config = config;
    this.dialect = dialect;
    this.adapter = adapter;
    this.emitter = emitter;
    this.logger = logger;
    this.registry = new TrustRegistry({ prefix: config.tokenPrefix, length: config.tokenLength });
    this.guardrails = {
      enabled: config.guardrails,
      emitter,
      policy: config.securityPolicy ?? new SecurityPolicy(),
      dialect,
      level: config.errorLevel,
    };
    this.connectedAt = new Date();
  }

  /**
   * Open a connection. The dialect comes from the URI scheme, or from the
   * adapter when one is passed in.
   */
  static async open(config: TrustSQLConfig, options: OpenOptions = {}): Promise<TrustSQL> {
    const resolved = resolveConfig(config);
    const dialect = getDialect(options.adapter?.dialect ?? detectDialect(resolved.uri));
    const adapter = options.adapter ?? createAdapter(dialect.name, resolved.uri);

    const emitter = new TrustSQLEventEmitter();
    const logger = new TrustSQLLogger(
      {
        enabled: resolved.logging !== false,
        verbose: resolved.logging === 'verbose',
        slowQueryMs: resolved.slowQueryMs,
      },
      emitter,
    );

    try {
      await adapter.connect();
    } catch (err) {
      throw mapDriverError(dialect.name, err, undefined, 'open');
    }

    const db = new TrustSQL(resolved, dialect, adapter, emitter, logger);
    emitter.emit('connected', {
      dialect: dialect.name,
      dbName: resolved.dbName ?? extractDbName(resolved.uri),
      label: resolved.label,
    });
    return db;
  }

  // ─── Trusted Fragments ─────────────────────────────────────────────────────

  /**
   * Register source SQL as trusted. Use only as a template tag with no
   * interpolations: db.ow`SELECT name FROM users WHERE age <`.
   */
  readonly ow = (strings: TemplateStringsArray, ...values: never[]): string => {
    const text = assertSourceLiteral(strings, values, this.dialect, this.config.errorLevel);
    assertBalancedFragment(text, this.dialect, this.config.errorLevel);
    return this.registry.register(text, 'source');
  };

  addAllowlist(values: Iterable<AllowlistValue>): void {
    for (const value of values) {
      this.allowed.add(allowlistKey(value));
    }
  }

  isAllowlisted(value: AllowlistValue): boolean {
    return this.allowed.has(allowlistKey(value));
  }

  /** Register an allow-listed runtime value as a trusted quoted literal. */
  allowlist(value: AllowlistValue): string {
    const key = allowlistKey(value);
    if (!this.allowed.has(key)) {
      throw new TrustSQLError({
        code: 'VALUE_NOT_ALLOWED',
        message: leveled(this.config.errorLevel, {
          release: 'Value is not allow-listed.',
          develop: 'db.allowlist() was given a value that is not in the allowlist.',
          debug: `db.allowlist() was given ${JSON.stringify(key.slice(0, 60))}, which is not in the allowlist.`,
        }),
        fix: 'Add the value with db.addAllowlist([...]) first, or concatenate it as plain data.',
        dialect: this.dialect.name,
        operation: 'allowlist',
      });
    }
    return this.registry.register(this.dialect.quoteLiteral(key), 'allowlist');
  }

  /** Register a signed 64-bit integer as a trusted, unquoted number. */
  int(value: number | bigint | string): string {
    return this.registry.register(assertInt64(value, this.dialect, this.config.errorLevel), 'integer');
  }

  // ─── Inspection ────────────────────────────────────────────────────────────

  /** The SQL that execute() would send. Never throws. */
  actualSql(composed: string): string {
    return reconstruct(composed, this.registry, this.dialect).sql;
  }

  /** Reconstruction plus the security verdict, without touching the driver. */
  explain(composed: string): ExplainResult {
    const reconstruction = reconstruct(composed, this.registry, this.dialect);
    return {
      dialect: this.dialect.name,
      sql: reconstruction.sql,
      pieces: reconstruction.pieces,
      violation: this.guardrails.enabled
        ? this.guardrails.policy.evaluate(inspect(reconstruction, this.dialect))
        : null,
    };
  }

  // ─── Execution ─────────────────────────────────────────────────────────────

  async execute(composed: string): Promise<StatementReceipt> {
    const { receipt } = await this.runStatement('execute', composed, async sql => {
      await this.adapter.runScript(sql);
      return { rows: [], rowCount: 0 };
    });
    return receipt;
  }

  async rows(composed: string): Promise<Row[]> {
    const { result } = await this.runStatement('rows', composed, sql => this.adapter.run(sql));
    return result.rows.map(record => new Row(record));
  }

  /**
   * Call `callback` for each result row until it returns false.
   * Resolves to the number of rows visited.
   */
  async iterate(composed: string, callback: RowCallback): Promise<number> {
    // A throwing callback stops the driver and is rethrown as is, not mapped.
    const callbackFailure: { thrown: boolean; error: unknown } = { thrown: false, error: undefined };
    const { result } = await this.runStatement('iterate', composed, async sql => {
      const visited = await this.adapter.iterate(sql, record => {
        try {
          return callback(new Row(record)) !== false;
        } catch (err) {
          callbackFailure.thrown = true;
          callbackFailure.error = err;
          return false;
        }
      });
      return { rows: [], rowCount: visited };
    });
    if (callbackFailure.thrown) throw callbackFailure.error;
    return result.rowCount;
  }

  // ─── Registry ──────────────────────────────────────────────────────────────

  clearRegistry(): void {
    this.registry.clear();
  }

  get registrySize(): number {
    return this.registry.size;
  }

  // ─── Lifecycle & Events ────────────────────────────────────────────────────

  status(): ConnectionStatus {
    return {
      state: this.connectedAt ? 'connected' : 'closed',
      dialect: this.dialect.name,
      driver: this.adapter.driver,
      uri: redactUri(this.config.uri),
      dbName: this.config.dbName ?? extractDbName(this.config.uri),
      label: this.config.label,
      uptimeMs: this.connectedAt ? Date.now() - this.connectedAt.getTime() : 0,
      registry: { scope: this.config.registryScope, size: this.registry.size },
    };
  }

  on<E extends keyof TrustSQLEvents>(event: E, listener: (payload: TrustSQLEvents[E]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<E extends keyof TrustSQLEvents>(event: E, listener: (payload: TrustSQLEvents[E]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<E extends keyof TrustSQLEvents>(event: E, listener: (payload: TrustSQLEvents[E]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  /** Close the driver connection and forget every token. Safe to call twice. */
  async close(): Promise<void> {
    if (!this.connectedAt) return;
    this.connectedAt = null;
    this.registry.clear();
    this.allowed.clear();
    await this.adapter.close();
    this.emitter.emit('closed', { dialect: this.dialect.name, label: this.config.label });
  }

  // ─── Internal ──────────────────────────────────────────────────────────────

  private async runStatement(
    operation: StatementOperation,
    composed: string,
    call: (sql: string) => Promise<DriverResult>,
  ): Promise<{ result: DriverResult; receipt: StatementReceipt }> {
    if (!this.connectedAt) throw connectionClosedError(this.dialect.name, operation);

    const startTime = Date.now();
    // Statement scope drops what was registered up to now; fragments
    // registered while the driver call is pending survive it.
    const scoped = this.config.registryScope === 'statement' ? this.registry.tokens() : [];
    try {
      const reconstruction = reconstruct(composed, this.registry, this.dialect);
      checkStatement(this.guardrails, reconstruction, operation);

      let result: DriverResult;
      try {
        result = await call(reconstruction.sql);
      } catch (err) {
        const sql = this.config.errorLevel === 'release' ? undefined : reconstruction.sql;
        const error = mapDriverError(this.dialect.name, err, sql, operation);
        this.emitter.emit('driver-error', {
          code: error.code,
          message: error.message,
          fix: error.fix,
          dialect: this.dialect.name,
        });
        throw error;
      }

      const receipt = createReceipt({
        operation,
        dialect: this.dialect.name,
        startTime,
        rowCount: result.rowCount,
      });
      this.logger.logStatement(receipt, reconstruction.sql);
      return { result, receipt };
    } finally {
      this.registry.forget(scoped);
    }
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function createAdapter(dialect: SqlDialect, uri: string): DriverAdapter {
  switch (dialect) {
    case 'sqlite':
      return new SqliteAdapter(uri);
    case 'mysql':
      return new MysqlAdapter(uri);
    case 'postgres':
      return new PostgresAdapter(uri);
  }
}

function extractDbName(uri: string): string {
  try {
    const url = new URL(uri);
    if (url.protocol === 'sqlite:' || url.protocol === 'file:') return url.pathname || 'memory';
    return url.pathname.replace(/^\//, '') || 'default';
  } catch {
    return 'default';
  }
}

function redactUri(uri: string): string {
  try {
    const url = new URL(uri);
    if (url.password) url.password = '***';
    return url.toString();
  } catch {
    return uri.replace(/\/\/[^:]+:[^@]+@/, '//***:***@');
  }
}
