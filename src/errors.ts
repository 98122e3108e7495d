/**
 * TrustSQL Error System: Normalized errors with fix instructions
 *
 * Every failure leaving the library is a TrustSQLError. Driver failures are
 * mapped into one taxonomy regardless of backend; the backend's own error is
 * kept on `originalError`.
 */

import type { ErrorCategory, ErrorLevel, SqlDialect, TrustErrorCode } from './types.js';

// ─── TrustSQLError ───────────────────────────────────────────────────────────

export class TrustSQLError extends Error {
  readonly code: TrustErrorCode;
  readonly category: ErrorCategory;
  readonly dialect?: SqlDialect;
  readonly originalError: unknown;
  readonly sql?: string;
  readonly operation?: string;
  readonly retryable: boolean;
  readonly timestamp: Date;
  readonly fix: string;

  constructor(opts: {
    code: TrustErrorCode;
    message: string;
    fix: string;
    dialect?: SqlDialect;
    originalError?: unknown;
    sql?: string;
    operation?: string;
    retryable?: boolean;
  }) {
    super(`${opts.message} Fix: ${opts.fix}`);
    this.name = 'TrustSQLError';
    this.code = opts.code;
    this.category = ERROR_CATEGORY[opts.code];
    this.dialect = opts.dialect;
    this.originalError = opts.originalError;
    this.sql = opts.sql;
    this.operation = opts.operation;
    this.retryable = opts.retryable ?? ERROR_RETRYABLE[opts.code];
    this.timestamp = new Date();
    this.fix = opts.fix;
  }
}

// ─── Error Code Metadata ─────────────────────────────────────────────────────

export const ERROR_CATEGORY: Record<TrustErrorCode, ErrorCategory> = {
  PROVENANCE_REJECTED: 'provenance',
  INVALID_FRAGMENT: 'provenance',
  VALUE_NOT_ALLOWED: 'provenance',
  INVALID_INTEGER: 'provenance',
  SECURITY_PATTERN: 'security',
  CONNECTION_FAILED: 'driver',
  AUTHENTICATION_FAILED: 'driver',
  TIMEOUT: 'driver',
  SYNTAX_ERROR: 'driver',
  DUPLICATE_KEY: 'driver',
  TABLE_NOT_FOUND: 'driver',
  DRIVER_ERROR: 'driver',
  INVALID_CONFIG: 'usage',
  UNSUPPORTED_DIALECT: 'usage',
  CONNECTION_CLOSED: 'usage',
};

export const ERROR_RETRYABLE: Record<TrustErrorCode, boolean> = {
  PROVENANCE_REJECTED: false,
  INVALID_FRAGMENT: false,
  VALUE_NOT_ALLOWED: false,
  INVALID_INTEGER: false,
  SECURITY_PATTERN: false,
  CONNECTION_FAILED: true,
  AUTHENTICATION_FAILED: false,
  TIMEOUT: true,
  SYNTAX_ERROR: false,
  DUPLICATE_KEY: false,
  TABLE_NOT_FOUND: false,
  DRIVER_ERROR: false,
  INVALID_CONFIG: false,
  UNSUPPORTED_DIALECT: false,
  CONNECTION_CLOSED: false,
};

// ─── Driver Error Mapping ────────────────────────────────────────────────────

/** Read a property off an unknown thrown value. */
function readProp(err: unknown, key: string): unknown {
  if (typeof err !== 'object' || err === null || !(key in err)) return undefined;
  return Reflect.get(err, key);
}

function readString(err: unknown, key: string): string {
  const value = readProp(err, key);
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

export function mapDriverError(
  dialect: SqlDialect,
  err: unknown,
  sql?: string,
  operation?: string,
): TrustSQLError {
  if (err instanceof TrustSQLError) return err;

  const code = readString(err, 'code');
  const message = readString(err, 'message') || String(err);
  const base = { dialect, originalError: err, sql, operation };

  // PostgreSQL 23505, MySQL ER_DUP_ENTRY, SQLite constraint
  if (code === '23505' || code === 'ER_DUP_ENTRY' || message.includes('UNIQUE constraint failed')) {
    return new TrustSQLError({
      ...base,
      code: 'DUPLICATE_KEY',
      message: `Duplicate key violation: ${message}`,
      fix: 'A row with this value already exists. Update it instead, or check for it first.',
    });
  }

  // PostgreSQL 42601, MySQL ER_PARSE_ERROR, SQLite "syntax error"
  if (code === '42601' || code === 'ER_PARSE_ERROR' || message.includes('syntax error')) {
    return new TrustSQLError({
      ...base,
      code: 'SYNTAX_ERROR',
      message: `The database rejected the statement as invalid SQL: ${message}`,
      fix: 'SQL keywords must come from db.ow`...` fragments. Text concatenated without db.ow is always sent as a quoted value.',
    });
  }

  // PostgreSQL 42P01, MySQL ER_NO_SUCH_TABLE, SQLite "no such table"
  if (code === '42P01' || code === 'ER_NO_SUCH_TABLE' || message.includes('no such table')) {
    return new TrustSQLError({
      ...base,
      code: 'TABLE_NOT_FOUND',
      message: `Table not found: ${message}`,
      fix: 'Create the table first, or check the table name in the db.ow`...` fragment.',
    });
  }

  // Authentication
  if (code === '28P01' || code === '28000' || code === 'ER_ACCESS_DENIED_ERROR' || message.includes('password authentication failed')) {
    return new TrustSQLError({
      ...base,
      code: 'AUTHENTICATION_FAILED',
      message: `Authentication failed: ${message}`,
      fix: 'Check the username and password in the connection URI.',
    });
  }

  // Connection refused / unreachable / cannot open file
  if (
    code === 'ECONNREFUSED' ||
    code === 'ENOTFOUND' ||
    code === 'SQLITE_CANTOPEN' ||
    message.includes('ECONNREFUSED') ||
    message.includes('connect ENOTFOUND') ||
    message.includes('Cannot open database') ||
    message.includes('unable to open database')
  ) {
    return new TrustSQLError({
      ...base,
      code: 'CONNECTION_FAILED',
      message: `Cannot connect to the ${dialect} database: ${message}`,
      fix: 'Verify the URI is correct and the database server (or file path) is reachable.',
    });
  }

  // PostgreSQL 57014 query_canceled, MySQL PROTOCOL_SEQUENCE_TIMEOUT, SQLite busy
  if (
    code === '57014' ||
    code === 'PROTOCOL_SEQUENCE_TIMEOUT' ||
    code === 'SQLITE_BUSY' ||
    message.includes('canceling statement due to statement timeout')
  ) {
    return new TrustSQLError({
      ...base,
      code: 'TIMEOUT',
      message: `Statement timed out: ${message}`,
      fix: 'Narrow the statement, add an index, or raise the statement timeout.',
    });
  }

  return new TrustSQLError({
    ...base,
    code: 'DRIVER_ERROR',
    message: `${dialect} driver error: ${message}`,
    fix: 'Check the original error for details.',
  });
}

// ─── Error Helpers ───────────────────────────────────────────────────────────

/**
 * Pick the message variant allowed by the error level. Release builds never
 * echo input back.
 */
export function leveled(level: ErrorLevel, messages: { release: string; develop: string; debug: string }): string {
  return messages[level];
}

export function connectionClosedError(dialect: SqlDialect, operation: string): TrustSQLError {
  return new TrustSQLError({
    code: 'CONNECTION_CLOSED',
    message: `Cannot run ${operation}() on a closed connection.`,
    fix: 'Open a new connection with TrustSQL.open(config).',
    dialect,
    operation,
  });
}
