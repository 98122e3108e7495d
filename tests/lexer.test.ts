/**
 * Lexer Tests: literal, identifier and comment spans per dialect
 */

import { describe, it, expect } from 'vitest';
import { findUnterminated, scanSql } from '../src/lexer.js';
import { mysqlDialect, postgresDialect, sqliteDialect } from '../src/dialect.js';

const kinds = (sql: string, rules = sqliteDialect.lexical) => scanSql(sql, rules).map(span => span.kind);

describe('scanSql', () => {
  it('splits code and a literal with a doubled quote', () => {
    expect(scanSql("SELECT 'a''b' FROM t", sqliteDialect.lexical)).toEqual([
      { kind: 'code', start: 0, end: 7, terminated: true },
      { kind: 'literal', start: 7, end: 13, terminated: true },
      { kind: 'code', start: 13, end: 20, terminated: true },
    ]);
  });

  it('marks an open literal as unterminated', () => {
    const spans = scanSql("SELECT 'abc", sqliteDialect.lexical);
    expect(findUnterminated(spans)).toEqual({ kind: 'literal', start: 7, end: 11, terminated: false });
  });

  it('ends a line comment at the newline', () => {
    expect(kinds('SELECT 1 -- note\nFROM t')).toEqual(['code', 'comment', 'code']);
  });

  it('marks an open block comment as unterminated', () => {
    expect(findUnterminated(scanSql('SELECT /* note', sqliteDialect.lexical))?.kind).toBe('comment');
  });

  it('treats bracketed names as identifiers in SQLite', () => {
    expect(kinds('SELECT [my col] FROM t')).toEqual(['code', 'identifier', 'code']);
  });

  it('honors backslash escapes in MySQL only', () => {
    const sql = String.raw`SELECT 'it\'s'`;
    expect(findUnterminated(scanSql(sql, mysqlDialect.lexical))).toBeUndefined();
    expect(findUnterminated(scanSql(sql, sqliteDialect.lexical))).toBeDefined();
  });

  it('treats # as a comment in MySQL', () => {
    expect(kinds('SELECT 1 # note', mysqlDialect.lexical)).toEqual(['code', 'comment']);
  });

  it('reads dollar-quoted bodies in PostgreSQL', () => {
    expect(kinds("SELECT $$it's$$", postgresDialect.lexical)).toEqual(['code', 'literal']);
    expect(findUnterminated(scanSql("SELECT $$it's$$", postgresDialect.lexical))).toBeUndefined();
  });

  it("reads E'' strings with backslash escapes in PostgreSQL", () => {
    expect(scanSql(String.raw`E'a\'b'`, postgresDialect.lexical)).toEqual([
      { kind: 'literal', start: 0, end: 7, terminated: true },
    ]);
  });
});
