/**
 * Fragment Registration Tests: provenance, balance and integers
 */

import { describe, it, expect } from 'vitest';
import { assertBalancedFragment, assertInt64, assertSourceLiteral, toInt64 } from '../src/fragment.js';
import { postgresDialect, sqliteDialect } from '../src/dialect.js';
import { TrustSQLError } from '../src/errors.js';

const capture = (strings: TemplateStringsArray, ...values: unknown[]) => ({ strings, values });

function thrown(fn: () => unknown): TrustSQLError {
  try {
    fn();
  } catch (err) {
    if (err instanceof TrustSQLError) return err;
    throw err;
  }
  throw new Error('expected a TrustSQLError');
}

describe('assertSourceLiteral', () => {
  it('returns the text of a tagged template without interpolations', () => {
    const { strings, values } = capture`SELECT name FROM users WHERE`;
    expect(assertSourceLiteral(strings, values, sqliteDialect, 'develop')).toBe('SELECT name FROM users WHERE');
  });

  it('rejects a plain string', () => {
    const err = thrown(() => assertSourceLiteral('SELECT 1', [], sqliteDialect, 'develop'));
    expect(err.code).toBe('PROVENANCE_REJECTED');
    expect(err.category).toBe('provenance');
    expect(err.operation).toBe('ow');
  });

  it('rejects a hand-built array', () => {
    const err = thrown(() => assertSourceLiteral(['SELECT 1'], [], sqliteDialect, 'develop'));
    expect(err.code).toBe('PROVENANCE_REJECTED');
  });

  it('rejects a frozen array without a raw twin', () => {
    const err = thrown(() => assertSourceLiteral(Object.freeze(['SELECT 1']), [], sqliteDialect, 'develop'));
    expect(err.code).toBe('PROVENANCE_REJECTED');
  });

  it('rejects interpolations', () => {
    const { strings, values } = capture`SELECT ${'name'} FROM users`;
    const err = thrown(() => assertSourceLiteral(strings, values, sqliteDialect, 'develop'));
    expect(err.code).toBe('PROVENANCE_REJECTED');
    expect(err.message).toContain('must not contain ${...} interpolations');
  });

  it('rejects a multi-part template even without values', () => {
    const { strings } = capture`SELECT ${1} FROM users`;
    expect(thrown(() => assertSourceLiteral(strings, [], sqliteDialect, 'develop')).code).toBe('PROVENANCE_REJECTED');
  });

  it('echoes nothing at release level', () => {
    const err = thrown(() => assertSourceLiteral('DROP TABLE users', [], sqliteDialect, 'release'));
    expect(err.message.startsWith('Only source literals can be registered as trusted SQL.')).toBe(true);
    expect(err.message).not.toContain('DROP TABLE users');
  });

  it('describes the value at debug level', () => {
    const err = thrown(() => assertSourceLiteral('x', [], sqliteDialect, 'debug'));
    expect(err.message.startsWith('db.ow must be used as a template tag; it was called with string "x".')).toBe(true);
  });
});

describe('assertBalancedFragment', () => {
  it('accepts balanced quotes', () => {
    expect(() => assertBalancedFragment("WHERE name = 'x'", sqliteDialect, 'develop')).not.toThrow();
  });

  it('rejects an open literal', () => {
    const err = thrown(() => assertBalancedFragment("WHERE name = '", sqliteDialect, 'develop'));
    expect(err.code).toBe('INVALID_FRAGMENT');
    expect(err.message.startsWith('Trusted fragment leaves a literal open.')).toBe(true);
  });

  it('rejects an open identifier', () => {
    expect(thrown(() => assertBalancedFragment('SELECT "users', sqliteDialect, 'develop')).code).toBe('INVALID_FRAGMENT');
  });

  it('follows the dialect: dollar quotes balance in PostgreSQL only', () => {
    expect(() => assertBalancedFragment("SELECT $$it's$$", postgresDialect, 'develop')).not.toThrow();
    expect(thrown(() => assertBalancedFragment("SELECT $$it's$$", sqliteDialect, 'develop')).code).toBe('INVALID_FRAGMENT');
  });
});

describe('toInt64', () => {
  it.each([
    [42, '42'],
    [-7n, '-7'],
    ['+15', '15'],
    ['007', '7'],
    ['9223372036854775807', '9223372036854775807'],
    ['-9223372036854775808', '-9223372036854775808'],
  ])('%s → %s', (value, expected) => {
    expect(toInt64(value)).toBe(expected);
  });

  it.each([
    ['9223372036854775808'],
    [1.5],
    ['1e3'],
    [' 1'],
    [Number.NaN],
    [Number.MAX_SAFE_INTEGER + 1],
    [true],
    [null],
  ])('rejects %s', value => {
    expect(toInt64(value)).toBeNull();
  });
});

describe('assertInt64', () => {
  it('returns the canonical form', () => {
    expect(assertInt64('0042', sqliteDialect, 'develop')).toBe('42');
  });

  it('throws INVALID_INTEGER', () => {
    const err = thrown(() => assertInt64('1; DROP TABLE users', sqliteDialect, 'develop'));
    expect(err.code).toBe('INVALID_INTEGER');
    expect(err.operation).toBe('int');
  });
});
