/**
 * TrustSQL: Public API Entry Point
 *
 * String-concatenation SQL for SQLite, MySQL and PostgreSQL where only source
 * literals can become SQL structure.
 */

// Main class
export { TrustSQL } from './trustsql.js';
export type { OpenOptions, RowCallback } from './trustsql.js';

// Error class
export { TrustSQLError, mapDriverError } from './errors.js';

// Configuration
export { configSchema, resolveConfig } from './config.js';
export type { ResolvedConfig, TrustSQLConfig } from './config.js';

// Reconstruction
export { TrustRegistry } from './registry.js';
export { reconstruct, segment } from './reconstruct.js';
export { DEFAULT_TOKEN_FORMAT, MAX_TOKEN_LENGTH, MIN_TOKEN_LENGTH } from './token.js';

// Dialects
export { detectDialect, getDialect, mysqlDialect, postgresDialect, sqliteDialect } from './dialect.js';
export type { Dialect } from './dialect.js';

// Security policy
export {
  DEFAULT_SECURITY_RULES,
  SecurityPolicy,
  commentAfterLiteralRule,
  commentSequenceRule,
  createSecurityPolicy,
  stackedStatementRule,
  tautologyRule,
  unionSelectRule,
  unterminatedLiteralRule,
} from './guardrails.js';
export type { InspectedStatement, SecurityRule } from './guardrails.js';

// Adapters
export type { DriverAdapter, RowVisitor } from './adapters/adapter.js';
export { visitRows } from './adapters/adapter.js';
export { SqliteAdapter } from './adapters/sqlite-adapter.js';
export { MysqlAdapter } from './adapters/mysql-adapter.js';
export { PostgresAdapter } from './adapters/postgres-adapter.js';

// Results & helpers
export { Row } from './row.js';
export { htmlSpecialChars, sanitizeLike } from './sanitize.js';

// Types
export type {
  AllowlistValue,
  ConnectionStatus,
  Driver,
  DriverResult,
  ErrorCategory,
  ErrorLevel,
  ExplainResult,
  FragmentOrigin,
  ReconstructedPiece,
  Reconstruction,
  RegistryScope,
  SecurityViolation,
  SqlDialect,
  StatementOperation,
  StatementReceipt,
  TokenFormat,
  TrustErrorCode,
  TrustSQLEvents,
  TrustedFragment,
} from './types.js';
