import type { Logger } from 'pino';
import { silentLogger } from '../logging/logger.js';

export interface RateLimiterOptions {
  /** Maximum acquisitions per window. */
  rpm: number;
  windowMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const DEFAULT_WINDOW_MS = 60_000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sliding-window limiter for oracle calls. Safe to share between engines:
 * acquisitions are serialized, so the check and the registration of a
 * timestamp never interleave.
 */
export class RateLimiter {
  readonly rpm: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private timestamps: number[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.rpm) || options.rpm < 1) {
      throw new RangeError(`rpm must be a positive integer, got ${options.rpm}`);
    }
    this.rpm = options.rpm;
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'rate-limiter' });
  }

  /** Resolves once a request slot is free and has been taken. */
  acquire(): Promise<void> {
    const run = this.tail.then(() => this.waitForSlot());
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Requests made in the current window. */
  getCurrentRpm(): number {
    return this.inWindow(this.now()).length;
  }

  /** Milliseconds until a slot frees up; 0 when one is free now. */
  getWaitTime(): number {
    const now = this.now();
    const active = this.inWindow(now);
    const oldest = active[0];
    if (active.length < this.rpm || oldest === undefined) return 0;
    return Math.max(0, oldest - (now - this.windowMs));
  }

  private async waitForSlot(): Promise<void> {
    for (;;) {
      const now = this.now();
      this.timestamps = this.inWindow(now);
      const oldest = this.timestamps[0];
      if (this.timestamps.length < this.rpm || oldest === undefined) {
        this.timestamps.push(now);
        return;
      }
      const waitMs = oldest - (now - this.windowMs);
      this.logger.debug({ waitMs, rpm: this.rpm }, 'rate limit reached, waiting');
      await this.sleep(waitMs);
    }
  }

  private inWindow(now: number): number[] {
    const windowStart = now - this.windowMs;
    return this.timestamps.filter((ts) => ts > windowStart);
  }
}
