/**
 * TrustSQL Tokens: Opaque markers standing in for trusted fragments
 *
 * A token is a fixed prefix followed by a fixed-length random alphanumeric
 * suffix. Tokens are drawn from node:crypto so that they cannot be predicted
 * from earlier ones.
 */

import { randomInt } from 'node:crypto';
import type { TokenFormat } from './types.js';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

export const MIN_TOKEN_LENGTH = 32;
export const MAX_TOKEN_LENGTH = 256;

export const DEFAULT_TOKEN_FORMAT: TokenFormat = {
  prefix: 'tsql_',
  length: MIN_TOKEN_LENGTH,
};

/** Mint one random token. Collision handling is the registry's job. */
export function mintToken(format: TokenFormat): string {
  let suffix = '';
  for (let i = 0; i < format.length; i++) {
    suffix += ALPHABET.charAt(randomInt(ALPHABET.length));
  }
  return format.prefix + suffix;
}

function isAlphanumeric(ch: string | undefined): boolean {
  return ch !== undefined && /^[A-Za-z0-9]$/.test(ch);
}

function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && /^\w$/.test(ch);
}

/**
 * Return the token starting at `index`, or null when the text there is not
 * token-shaped. A token must stand as a whole word: `xtsql_…` or `tsql_…x`
 * never match.
 */
export function matchTokenAt(text: string, index: number, format: TokenFormat): string | null {
  if (!text.startsWith(format.prefix, index)) return null;
  if (isWordChar(text[index - 1])) return null;

  const start = index + format.prefix.length;
  const end = start + format.length;
  if (end > text.length) return null;

  for (let i = start; i < end; i++) {
    if (!isAlphanumeric(text[i])) return null;
  }
  if (isWordChar(text[end])) return null;

  return text.slice(index, end);
}
