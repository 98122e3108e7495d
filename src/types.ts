/**
 * TrustSQL: All shared types and interfaces
 *
 * Leaf module: everything else may import from here, this file imports nothing
 * from the rest of the package.
 */

// ─── Dialect & Driver ────────────────────────────────────────────────────────

export type SqlDialect = 'sqlite' | 'mysql' | 'postgres';
export type Driver = 'better-sqlite3' | 'mysql2' | 'pg';

// ─── Trust Registry ──────────────────────────────────────────────────────────

/** Where a trusted fragment came from. Only `source` is developer-written SQL. */
export type FragmentOrigin = 'source' | 'allowlist' | 'integer';

export interface TrustedFragment {
  text: string;
  origin: FragmentOrigin;
  registeredAt: Date;
}

export interface TokenFormat {
  prefix: string;
  length: number;
}

export type RegistryScope = 'connection' | 'statement';

export type AllowlistValue = string | number | bigint | boolean;

// ─── Reconstruction ──────────────────────────────────────────────────────────

export type ParsedSegment =
  | { kind: 'trusted'; token: string; fragment: TrustedFragment }
  | { kind: 'raw'; text: string };

export type ReconstructedPiece =
  | { kind: 'trusted'; token: string; text: string }
  | { kind: 'literal'; value: string; text: string };

export interface Reconstruction {
  sql: string;
  pieces: ReconstructedPiece[];
}

// ─── Security Policy ─────────────────────────────────────────────────────────

export interface SecurityViolation {
  rule: string;
  reason: string;
}

export interface ExplainResult {
  dialect: SqlDialect;
  sql: string;
  pieces: ReconstructedPiece[];
  violation: SecurityViolation | null;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export type TrustErrorCode =
  | 'PROVENANCE_REJECTED'
  | 'INVALID_FRAGMENT'
  | 'VALUE_NOT_ALLOWED'
  | 'INVALID_INTEGER'
  | 'SECURITY_PATTERN'
  | 'CONNECTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'TIMEOUT'
  | 'SYNTAX_ERROR'
  | 'DUPLICATE_KEY'
  | 'TABLE_NOT_FOUND'
  | 'DRIVER_ERROR'
  | 'INVALID_CONFIG'
  | 'UNSUPPORTED_DIALECT'
  | 'CONNECTION_CLOSED';

export type ErrorCategory = 'provenance' | 'security' | 'driver' | 'usage';

/** How much of the refused input an error message may echo back. */
export type ErrorLevel = 'release' | 'develop' | 'debug';

// ─── Statement Receipt ───────────────────────────────────────────────────────

export type StatementOperation = 'execute' | 'rows' | 'iterate';

export interface StatementReceipt {
  operation: StatementOperation;
  dialect: SqlDialect;
  success: boolean;
  rowCount: number;
  duration: number;
}

// ─── Driver Results ──────────────────────────────────────────────────────────

export interface DriverResult {
  rows: Record<string, unknown>[];
  rowCount: number;
}

// ─── Event Types ─────────────────────────────────────────────────────────────

export interface TrustSQLEvents {
  connected: { dialect: SqlDialect; dbName: string; label: string };
  closed: { dialect: SqlDialect; label: string };
  statement: { operation: StatementOperation; durationMs: number; receipt: StatementReceipt; sql?: string };
  'slow-statement': { operation: StatementOperation; durationMs: number; threshold: number };
  'security-blocked': { rule: string; reason: string; dialect: SqlDialect };
  'driver-error': { code: TrustErrorCode; message: string; fix: string; dialect: SqlDialect };
}

// ─── Connection Status ───────────────────────────────────────────────────────

export interface ConnectionStatus {
  state: 'connected' | 'closed';
  dialect: SqlDialect;
  driver: Driver;
  uri: string;
  dbName: string;
  label: string;
  uptimeMs: number;
  registry: { scope: RegistryScope; size: number };
}
