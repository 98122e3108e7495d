/**
 * TrustSQL Fragment Registration: who may become trusted SQL
 *
 * Only text written in program source may be registered. In TypeScript the
 * closest thing to "a literal embedded in source" is a tagged template: the
 * engine hands the tag a frozen strings array with a frozen `raw` twin, and
 * with no interpolations the whole fragment is source text. Anything else
 * (a plain string, a template with ${...} holes, a hand-built array) is
 * rejected before the registry is touched.
 */

import { TrustSQLError, leveled } from './errors.js';
import { findUnterminated, scanSql } from './lexer.js';
import type { Dialect } from './dialect.js';
import type { AllowlistValue, ErrorLevel } from './types.js';

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

function describeValue(value: unknown): string {
  if (typeof value === 'string') return `string ${JSON.stringify(value.slice(0, 60))}`;
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function isTemplateStrings(value: unknown): value is TemplateStringsArray {
  if (!Array.isArray(value) || !Object.isFrozen(value)) return false;
  const raw: unknown = Reflect.get(value, 'raw');
  return Array.isArray(raw) && Object.isFrozen(raw) && raw.length === value.length;
}

/**
 * Return the source text of a tagged template call, or throw
 * PROVENANCE_REJECTED.
 */
export function assertSourceLiteral(
  strings: unknown,
  values: readonly unknown[],
  dialect: Dialect,
  level: ErrorLevel,
): string {
  if (!isTemplateStrings(strings)) {
    throw new TrustSQLError({
      code: 'PROVENANCE_REJECTED',
      message: leveled(level, {
        release: 'Only source literals can be registered as trusted SQL.',
        develop: 'db.ow must be used as a template tag; it was called with a runtime value.',
        debug: `db.ow must be used as a template tag; it was called with ${describeValue(strings)}.`,
      }),
      fix: 'Write the SQL in place: db.ow`SELECT name FROM users WHERE`. Concatenate runtime values with + instead.',
      dialect: dialect.name,
      operation: 'ow',
    });
  }

  const text = strings[0];
  if (values.length > 0 || strings.length !== 1 || text === undefined) {
    throw new TrustSQLError({
      code: 'PROVENANCE_REJECTED',
      message: leveled(level, {
        release: 'Only source literals can be registered as trusted SQL.',
        develop: 'db.ow`...` must not contain ${...} interpolations.',
        debug: `db.ow\`...\` was given ${values.length} interpolated value(s).`,
      }),
      fix: 'Move the value out of the template: db.ow`WHERE id =` + id.',
      dialect: dialect.name,
      operation: 'ow',
    });
  }

  return text;
}

/** Trusted text must not leave a literal, identifier or comment open. */
export function assertBalancedFragment(text: string, dialect: Dialect, level: ErrorLevel): void {
  const open = findUnterminated(scanSql(text, dialect.lexical));
  if (!open) return;

  throw new TrustSQLError({
    code: 'INVALID_FRAGMENT',
    message: leveled(level, {
      release: 'Trusted fragment is not well-formed.',
      develop: `Trusted fragment leaves a ${open.kind} open.`,
      debug: `Trusted fragment leaves a ${open.kind} open at offset ${open.start}: ${text}`,
    }),
    fix: "Do not wrap runtime values in quotes yourself: db.ow`WHERE name =` + name, not db.ow`WHERE name = '` + name + db.ow`'`.",
    dialect: dialect.name,
    operation: 'ow',
  });
}

/** Canonical decimal form of a signed 64-bit integer, or null. */
export function toInt64(value: unknown): string | null {
  let n: bigint;
  if (typeof value === 'bigint') {
    n = value;
  } else if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) return null;
    n = BigInt(value);
  } else if (typeof value === 'string') {
    if (!/^[+-]?\d+$/.test(value)) return null;
    n = BigInt(value);
  } else {
    return null;
  }
  if (n < I64_MIN || n > I64_MAX) return null;
  return n.toString();
}

export function assertInt64(value: unknown, dialect: Dialect, level: ErrorLevel): string {
  const canonical = toInt64(value);
  if (canonical !== null) return canonical;

  throw new TrustSQLError({
    code: 'INVALID_INTEGER',
    message: leveled(level, {
      release: 'Value is not an integer.',
      develop: 'db.int() was given a value that is not a signed 64-bit integer.',
      debug: `db.int() was given ${describeValue(value)}, which is not a signed 64-bit integer.`,
    }),
    fix: 'Validate the input as an integer first, or concatenate it as a quoted value instead.',
    dialect: dialect.name,
    operation: 'int',
  });
}

/** Allowlist entries are compared by their string form. */
export function allowlistKey(value: AllowlistValue): string {
  return String(value);
}
