/**
 * TrustSQL Events
 *
 * `connected` and `closed` bracket a connection. Each finished statement emits
 * `statement`, plus `slow-statement` past the configured threshold. A refusal
 * by the security policy emits `security-blocked` before the throw, and a
 * mapped driver failure emits `driver-error`; an `error` event with no
 * listener would throw.
 */

import { EventEmitter } from 'events';
import type { TrustSQLEvents } from './types.js';

export class TrustSQLEventEmitter extends EventEmitter {
  on<E extends keyof TrustSQLEvents>(
    event: E,
    listener: (payload: TrustSQLEvents[E]) => void,
  ): this {
    return super.on(event, listener);
  }

  once<E extends keyof TrustSQLEvents>(
    event: E,
    listener: (payload: TrustSQLEvents[E]) => void,
  ): this {
    return super.once(event, listener);
  }

  emit<E extends keyof TrustSQLEvents>(
    event: E,
    payload: TrustSQLEvents[E],
  ): boolean {
    return super.emit(event, payload);
  }

  off<E extends keyof TrustSQLEvents>(
    event: E,
    listener: (payload: TrustSQLEvents[E]) => void,
  ): this {
    return super.off(event, listener);
  }
}
