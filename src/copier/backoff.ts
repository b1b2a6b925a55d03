/**
 * Address-scoped exponential backoff
 *
 * Window after n consecutive failures: base * 2^(n-1), capped at max.
 */

import type { Clock } from './throttle.js';

interface BackoffEntry {
  failures: number;
  until: number;
}

export class AddressBackoff {
  private entries = new Map<string, BackoffEntry>();

  constructor(
    private baseMs: number,
    private maxMs: number,
    private now: Clock = Date.now
  ) {}

  isBlocked(address: string): boolean {
    const entry = this.entries.get(address.toLowerCase());
    return entry !== undefined && this.now() < entry.until;
  }

  /**
   * Returns the window just opened
   */
  recordFailure(address: string): number {
    const key = address.toLowerCase();
    const failures = (this.entries.get(key)?.failures ?? 0) + 1;
    const windowMs = Math.min(this.baseMs * 2 ** (failures - 1), this.maxMs);
    this.entries.set(key, { failures, until: this.now() + windowMs });
    return windowMs;
  }

  recordSuccess(address: string): void {
    this.entries.delete(address.toLowerCase());
  }
}
