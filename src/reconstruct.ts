/**
 * TrustSQL Reconstruction: composed text → final SQL
 *
 * The composed string is whatever the caller concatenated: padded tokens from
 * db.ow`...` mixed with runtime text. Tokens found in the registry are
 * replaced by their fragment, untouched. Everything else is data and leaves as
 * exactly one escaped, quoted literal per run of text between tokens.
 *
 * Pure and total: no I/O, no mutation, never throws.
 */

import type { Dialect } from './dialect.js';
import type { TrustRegistry } from './registry.js';
import { matchTokenAt } from './token.js';
import type { ParsedSegment, ReconstructedPiece, Reconstruction } from './types.js';

/**
 * Split composed text into trusted and raw segments.
 *
 * Whitespace around a trusted token only delimits it: raw spans are trimmed,
 * and a span that is nothing but whitespace yields no segment. A token-shaped
 * substring the registry does not know stays inside the surrounding raw text.
 */
export function segment(composed: string, registry: TrustRegistry): ParsedSegment[] {
  const { prefix } = registry.format;
  const segments: ParsedSegment[] = [];
  let rawStart = 0;
  let sawTrusted = false;

  const pushRaw = (end: number): void => {
    const text = composed.slice(rawStart, end).trim();
    if (text !== '') segments.push({ kind: 'raw', text });
  };

  let at = composed.indexOf(prefix);
  while (at !== -1) {
    const token = matchTokenAt(composed, at, registry.format);
    const fragment = token === null ? undefined : registry.resolve(token);

    if (token === null || fragment === undefined) {
      at = composed.indexOf(prefix, at + 1);
      continue;
    }

    pushRaw(at);

    segments.push({ kind: 'trusted', token, fragment });
    sawTrusted = true;

    rawStart = at + token.length;
    at = composed.indexOf(prefix, rawStart);
  }

  if (!sawTrusted) {
    return [{ kind: 'raw', text: composed }];
  }
  pushRaw(composed.length);
  return segments;
}

export function reconstruct(composed: string, registry: TrustRegistry, dialect: Dialect): Reconstruction {
  const pieces = segment(composed, registry).map((seg): ReconstructedPiece =>
    seg.kind === 'trusted'
      ? { kind: 'trusted', token: seg.token, text: seg.fragment.text }
      : { kind: 'literal', value: seg.text, text: dialect.quoteLiteral(seg.text) },
  );

  return {
    sql: pieces.map(piece => `${piece.text} `).join(''),
    pieces,
  };
}
