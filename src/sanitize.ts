/**
 * TrustSQL Value Helpers
 *
 * Neither helper makes a value trusted. Both return plain data that is still
 * concatenated as a quoted literal.
 */

/**
 * Escape LIKE wildcards (`%`, `_`) and the escape character itself.
 *
 * Pair the result with `ESCAPE '\'` (or the chosen character) in the trusted
 * fragment: db.ow`WHERE name LIKE` + sanitizeLike(input) + db.ow`ESCAPE '!'`.
 */
export function sanitizeLike(pattern: string, escapeChar = '\\'): string {
  let escaped = '';
  for (const ch of pattern) {
    if (ch === '%' || ch === '_' || ch === escapeChar) escaped += escapeChar;
    escaped += ch;
  }
  return escaped;
}

const HTML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '"': '&quot;',
  "'": '&#39;',
  '<': '&lt;',
  '>': '&gt;',
};

/** Replace &, ", ', < and > with HTML entities. */
export function htmlSpecialChars(input: string): string {
  return input.replace(/[&"'<>]/g, ch => HTML_ENTITIES[ch] ?? ch);
}
