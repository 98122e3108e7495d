/**
 * TrustSQL Lexer: quote- and comment-aware span scanner
 *
 * This is not a SQL parser. It only splits text into code, string literals,
 * quoted identifiers and comments, which is all that registration (balanced
 * quotes) and the security policy (where does data live?) need to know.
 */

export type SpanKind = 'code' | 'literal' | 'identifier' | 'comment';

export interface SqlSpan {
  kind: SpanKind;
  start: number;
  end: number;
  /** False when the literal, identifier or block comment runs off the end of the input. */
  terminated: boolean;
}

export interface LexicalRules {
  stringQuotes: readonly string[];
  /** [open, close] pairs */
  identifierQuotes: ReadonlyArray<readonly [string, string]>;
  lineComments: readonly string[];
  /** Backslash escapes the next character inside every string literal (MySQL). */
  backslashEscapes: boolean;
  /** Prefix that turns on backslash escapes for one literal (PostgreSQL E'...'). */
  escapeStringPrefix: string | null;
  dollarQuotes: boolean;
}

const DOLLAR_TAG = /^\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/;

function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && /^\w$/.test(ch);
}

function scanQuoted(
  sql: string,
  open: number,
  close: string,
  backslash: boolean,
  doubling: boolean,
): { end: number; terminated: boolean } {
  let i = open + 1;
  while (i < sql.length) {
    const ch = sql[i];
    if (backslash && ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === close) {
      if (doubling && sql[i + 1] === close) {
        i += 2;
        continue;
      }
      return { end: i + 1, terminated: true };
    }
    i++;
  }
  return { end: sql.length, terminated: false };
}

export function scanSql(sql: string, rules: LexicalRules): SqlSpan[] {
  const spans: SqlSpan[] = [];
  let codeStart = 0;
  let i = 0;

  const flushCode = (end: number): void => {
    if (end > codeStart) {
      spans.push({ kind: 'code', start: codeStart, end, terminated: true });
    }
  };
  const push = (kind: SpanKind, start: number, end: number, terminated: boolean): void => {
    flushCode(start);
    spans.push({ kind, start, end, terminated });
    i = end;
    codeStart = end;
  };

  while (i < sql.length) {
    const ch = sql[i];

    const lineComment = rules.lineComments.find(c => sql.startsWith(c, i));
    if (lineComment) {
      const newline = sql.indexOf('\n', i);
      push('comment', i, newline === -1 ? sql.length : newline, true);
      continue;
    }

    if (sql.startsWith('/*', i)) {
      const close = sql.indexOf('*/', i + 2);
      if (close === -1) push('comment', i, sql.length, false);
      else push('comment', i, close + 2, true);
      continue;
    }

    if (
      rules.escapeStringPrefix !== null &&
      ch !== undefined &&
      ch.toUpperCase() === rules.escapeStringPrefix &&
      sql[i + 1] === "'" &&
      !isWordChar(sql[i - 1])
    ) {
      const { end, terminated } = scanQuoted(sql, i + 1, "'", true, true);
      push('literal', i, end, terminated);
      continue;
    }

    if (ch !== undefined && rules.stringQuotes.includes(ch)) {
      const { end, terminated } = scanQuoted(sql, i, ch, rules.backslashEscapes, true);
      push('literal', i, end, terminated);
      continue;
    }

    const identifier = rules.identifierQuotes.find(([open]) => open === ch);
    if (identifier) {
      const [open, close] = identifier;
      const { end, terminated } = scanQuoted(sql, i, close, false, open === close);
      push('identifier', i, end, terminated);
      continue;
    }

    if (rules.dollarQuotes && ch === '$' && !isWordChar(sql[i - 1])) {
      const tag = DOLLAR_TAG.exec(sql.slice(i))?.[0];
      if (tag) {
        const close = sql.indexOf(tag, i + tag.length);
        if (close === -1) push('literal', i, sql.length, false);
        else push('literal', i, close + tag.length, true);
        continue;
      }
    }

    i++;
  }

  flushCode(sql.length);
  return spans;
}

/** The first span left open, if any. */
export function findUnterminated(spans: readonly SqlSpan[]): SqlSpan | undefined {
  return spans.find(span => !span.terminated);
}
