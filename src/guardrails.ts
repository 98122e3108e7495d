/**
 * TrustSQL Guardrails: denylist pass before execution
 *
 * Reconstruction already keeps runtime text inside quotes. This is a second,
 * independent layer: an ordered policy of rules run against the reconstructed
 * statement. The first rule that matches refuses execution. Display paths
 * (actualSql, explain) never throw on a match.
 *
 * Data rules only look at runtime values that were spliced into trusted
 * structure. A statement with no trusted piece at all is one lone literal,
 * which the database rejects on its own.
 */

import { TrustSQLError, leveled } from './errors.js';
import { scanSql } from './lexer.js';
import type { SqlSpan } from './lexer.js';
import type { Dialect } from './dialect.js';
import type { TrustSQLEventEmitter } from './events.js';
import type { ErrorLevel, ReconstructedPiece, Reconstruction, SecurityViolation } from './types.js';

export interface InspectedStatement {
  sql: string;
  dialect: Dialect;
  pieces: readonly ReconstructedPiece[];
  spans: readonly SqlSpan[];
  /** Runtime values spliced into trusted structure. */
  data: readonly string[];
}

export interface SecurityRule {
  name: string;
  description: string;
  /** Return a reason when the statement matches, otherwise null. */
  check(statement: InspectedStatement): string | null;
}

export function inspect(reconstruction: Reconstruction, dialect: Dialect): InspectedStatement {
  const structured = reconstruction.pieces.some(piece => piece.kind === 'trusted');
  const data = structured
    ? reconstruction.pieces.flatMap(piece => (piece.kind === 'literal' ? [piece.value] : []))
    : [];

  return {
    sql: reconstruction.sql,
    dialect,
    pieces: reconstruction.pieces,
    spans: scanSql(reconstruction.sql, dialect.lexical),
    data,
  };
}

// ─── Default Rules ───────────────────────────────────────────────────────────

const STATEMENT_KEYWORDS = [
  'SELECT', 'INSERT', 'UPDATE', 'DELETE', 'REPLACE', 'MERGE', 'UPSERT',
  'DROP', 'CREATE', 'ALTER', 'TRUNCATE', 'RENAME',
  'GRANT', 'REVOKE', 'EXEC', 'EXECUTE', 'CALL', 'DECLARE', 'SET', 'USE',
  'ATTACH', 'DETACH', 'PRAGMA', 'VACUUM', 'SHUTDOWN', 'LOAD', 'COPY',
  'BEGIN', 'COMMIT', 'ROLLBACK',
];

const STACKED_STATEMENT = new RegExp(`;\\s*(?:$|--|/\\*|#|(?:${STATEMENT_KEYWORDS.join('|')})\\b)`, 'i');
const COMMENT_OPENER = /--|\/\*/;
// The closing quote may be missing: the surrounding literal supplies it.
const TAUTOLOGY = /\b(?:OR|AND)\s+(['"]?)(\w+)\1\s*=\s*\1\2(?:\1(?!\w)|$)/i;
const UNION_SELECT = /\bUNION\s+(?:ALL\s+)?SELECT\b/i;

function dataRule(name: string, description: string, pattern: RegExp, reason: string): SecurityRule {
  return {
    name,
    description,
    check(statement) {
      return statement.data.some(value => pattern.test(value)) ? reason : null;
    },
  };
}

export const unterminatedLiteralRule: SecurityRule = {
  name: 'unterminated-literal',
  description: 'A string literal, quoted identifier or block comment is left open.',
  check(statement) {
    const open = statement.spans.find(span => !span.terminated);
    return open ? `the statement leaves a ${open.kind} open` : null;
  },
};

export const stackedStatementRule = dataRule(
  'stacked-statement',
  'A runtime value contains a statement separator followed by more SQL, a comment or nothing.',
  STACKED_STATEMENT,
  'a runtime value contains a statement separator',
);

export const commentAfterLiteralRule: SecurityRule = {
  name: 'comment-after-literal',
  description: 'A comment begins directly after a closing literal quote.',
  check(statement) {
    const { spans, sql } = statement;
    for (let k = 0; k < spans.length; k++) {
      if (spans[k]?.kind !== 'literal') continue;
      let j = k + 1;
      let next = spans[j];
      while (next && next.kind === 'code' && sql.slice(next.start, next.end).trim() === '') {
        next = spans[++j];
      }
      if (next?.kind === 'comment') return 'a comment follows a closing quote';
    }
    return null;
  },
};

export const commentSequenceRule = dataRule(
  'comment-sequence',
  'A runtime value contains a comment opener (-- or /*).',
  COMMENT_OPENER,
  'a runtime value contains a comment opener',
);

export const tautologyRule = dataRule(
  'tautology',
  "A runtime value contains an always-true comparison such as OR 1=1 or OR 'a'='a'.",
  TAUTOLOGY,
  'a runtime value contains an always-true comparison',
);

export const unionSelectRule = dataRule(
  'union-select',
  'A runtime value contains UNION SELECT.',
  UNION_SELECT,
  'a runtime value contains UNION SELECT',
);

export const DEFAULT_SECURITY_RULES: readonly SecurityRule[] = [
  unterminatedLiteralRule,
  stackedStatementRule,
  commentAfterLiteralRule,
  commentSequenceRule,
  tautologyRule,
  unionSelectRule,
];

// ─── Policy ──────────────────────────────────────────────────────────────────

export class SecurityPolicy {
  readonly rules: readonly SecurityRule[];

  constructor(rules: readonly SecurityRule[] = DEFAULT_SECURITY_RULES) {
    this.rules = [...rules];
  }

  get ruleNames(): string[] {
    return this.rules.map(rule => rule.name);
  }

  /** First matching rule, or null. Never throws. */
  evaluate(statement: InspectedStatement): SecurityViolation | null {
    for (const rule of this.rules) {
      const reason = rule.check(statement);
      if (reason !== null) return { rule: rule.name, reason };
    }
    return null;
  }
}

export function createSecurityPolicy(opts: {
  rules?: readonly SecurityRule[];
  exclude?: readonly string[];
  extend?: readonly SecurityRule[];
} = {}): SecurityPolicy {
  const excluded = new Set(opts.exclude ?? []);
  const base = (opts.rules ?? DEFAULT_SECURITY_RULES).filter(rule => !excluded.has(rule.name));
  return new SecurityPolicy([...base, ...(opts.extend ?? [])]);
}

// ─── Check ───────────────────────────────────────────────────────────────────

export interface GuardrailContext {
  enabled: boolean;
  emitter: TrustSQLEventEmitter;
  policy: SecurityPolicy;
  dialect: Dialect;
  level: ErrorLevel;
}

/**
 * Refuse a reconstructed statement that matches the policy.
 * Throws TrustSQLError with code SECURITY_PATTERN.
 */
export function checkStatement(ctx: GuardrailContext, reconstruction: Reconstruction, operation: string): void {
  if (!ctx.enabled) return;

  const violation = ctx.policy.evaluate(inspect(reconstruction, ctx.dialect));
  if (!violation) return;

  ctx.emitter.emit('security-blocked', { ...violation, dialect: ctx.dialect.name });

  throw new TrustSQLError({
    code: 'SECURITY_PATTERN',
    message: leveled(ctx.level, {
      release: 'Statement refused by the security policy.',
      develop: `Statement refused by security rule "${violation.rule}": ${violation.reason}.`,
      debug: `Statement refused by security rule "${violation.rule}": ${violation.reason}. SQL: ${reconstruction.sql}`,
    }),
    fix: 'Reject this input before it reaches the query, or open the connection with a securityPolicy that excludes the rule if such values are legitimate.',
    dialect: ctx.dialect.name,
    sql: ctx.level === 'release' ? undefined : reconstruction.sql,
    operation,
  });
}
