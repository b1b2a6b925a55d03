/**
 * Rate throttling primitives
 */

export type Clock = () => number;
export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * "Enough time since the last action for this key?"
 */
export class Throttle {
  private last = new Map<string, number>();

  constructor(
    private intervalMs: number,
    private now: Clock = Date.now
  ) {}

  canRun(key: string): boolean {
    const last = this.last.get(key);
    return last === undefined || this.now() - last >= this.intervalMs;
  }

  touch(key: string): void {
    this.last.set(key, this.now());
  }

}

/**
 * Blocking limiter: each caller reserves the next free slot and waits for it.
 * Calls are spaced at least 1/rps apart and never dropped.
 */
export class RateLimiter {
  private readonly minIntervalMs: number;
  private nextSlot = 0;

  constructor(
    maxRps: number,
    private sleep: Sleep = defaultSleep,
    private now: Clock = Date.now
  ) {
    this.minIntervalMs = maxRps > 0 ? 1000 / maxRps : 0;
  }

  async acquire(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    // Reserve synchronously so concurrent callers queue behind each other
    this.nextSlot = slot + this.minIntervalMs;

    const wait = slot - now;
    if (wait > 0) await this.sleep(wait);
  }
}
