/**
 * TrustSQL Dialects: backend quoting and escaping conventions
 *
 * A dialect is chosen once, when the connection is opened, from the URI scheme.
 */

import { TrustSQLError } from './errors.js';
import type { LexicalRules } from './lexer.js';
import type { Driver, SqlDialect } from './types.js';

export interface Dialect {
  readonly name: SqlDialect;
  readonly driver: Driver;
  readonly quote: string;
  readonly lexical: LexicalRules;
  /** Escape a value for use between two `quote` characters. */
  escape(value: string): string;
  /** Escape and quote a value as one string literal. */
  quoteLiteral(value: string): string;
}

function doubleQuotes(value: string): string {
  return value.replace(/'/g, "''");
}

function doubleBackslashes(value: string): string {
  return value.replace(/\\/g, '\\\\');
}

export const sqliteDialect: Dialect = {
  name: 'sqlite',
  driver: 'better-sqlite3',
  quote: "'",
  lexical: {
    stringQuotes: ["'"],
    identifierQuotes: [['"', '"'], ['`', '`'], ['[', ']']],
    lineComments: ['--'],
    backslashEscapes: false,
    escapeStringPrefix: null,
    dollarQuotes: false,
  },
  escape: doubleQuotes,
  quoteLiteral(value) {
    return `'${doubleQuotes(value)}'`;
  },
};

export const mysqlDialect: Dialect = {
  name: 'mysql',
  driver: 'mysql2',
  quote: "'",
  lexical: {
    // Without ANSI_QUOTES, "..." is a string literal in MySQL.
    stringQuotes: ["'", '"'],
    identifierQuotes: [['`', '`']],
    lineComments: ['--', '#'],
    backslashEscapes: true,
    escapeStringPrefix: null,
    dollarQuotes: false,
  },
  escape(value) {
    return doubleQuotes(doubleBackslashes(value));
  },
  quoteLiteral(value) {
    return `'${doubleQuotes(doubleBackslashes(value))}'`;
  },
};

export const postgresDialect: Dialect = {
  name: 'postgres',
  driver: 'pg',
  quote: "'",
  lexical: {
    stringQuotes: ["'"],
    identifierQuotes: [['"', '"']],
    lineComments: ['--'],
    backslashEscapes: false,
    escapeStringPrefix: 'E',
    dollarQuotes: true,
  },
  escape: doubleQuotes,
  // A plain literal's backslashes depend on standard_conforming_strings, so a
  // value containing one is sent as an E'' literal, which never does.
  quoteLiteral(value) {
    if (value.includes('\\')) {
      return `E'${doubleQuotes(doubleBackslashes(value))}'`;
    }
    return `'${doubleQuotes(value)}'`;
  },
};

const DIALECTS: Record<SqlDialect, Dialect> = {
  sqlite: sqliteDialect,
  mysql: mysqlDialect,
  postgres: postgresDialect,
};

export function getDialect(name: SqlDialect): Dialect {
  return DIALECTS[name];
}

export function detectDialect(uri: string): SqlDialect {
  if (uri.startsWith('postgresql://') || uri.startsWith('postgres://')) return 'postgres';
  if (uri.startsWith('mysql://')) return 'mysql';
  if (uri.startsWith('sqlite:') || uri.startsWith('file:') || uri === ':memory:') return 'sqlite';

  throw new TrustSQLError({
    code: 'UNSUPPORTED_DIALECT',
    message: `Unsupported URI scheme in "${uri.substring(0, 20)}..."`,
    fix: 'Use sqlite:<path>, file:<path>, mysql://, postgres:// or postgresql://.',
  });
}
