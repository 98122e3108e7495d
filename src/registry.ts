/**
 * TrustSQL Trust Registry: token → trusted fragment store
 *
 * One registry per connection. Entries are added, or dropped by forget() and
 * clear(); a token is never rebound to another fragment.
 */

import { mintToken } from './token.js';
import type { FragmentOrigin, TokenFormat, TrustedFragment } from './types.js';

export class TrustRegistry {
  readonly format: TokenFormat;
  private entries = new Map<string, TrustedFragment>();

  constructor(format: TokenFormat) {
    this.format = { ...format };
  }

  /**
   * Store a fragment under a fresh token and return the token padded with one
   * space on each side, so that concatenated registrations stay
   * whitespace-delimited.
   */
  register(text: string, origin: FragmentOrigin): string {
    let token = mintToken(this.format);
    while (this.entries.has(token)) {
      token = mintToken(this.format);
    }
    this.entries.set(token, { text, origin, registeredAt: new Date() });
    return ` ${token} `;
  }

  resolve(token: string): TrustedFragment | undefined {
    return this.entries.get(token);
  }

  has(token: string): boolean {
    return this.entries.has(token);
  }

  /** Tokens registered so far. */
  tokens(): string[] {
    return [...this.entries.keys()];
  }

  forget(tokens: Iterable<string>): void {
    for (const token of tokens) this.entries.delete(token);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
