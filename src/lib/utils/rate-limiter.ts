// lib/utils/rate-limiter.ts
import { sleep } from "./concurrency";

/**
 * Minimum spacing between outbound requests, shared by every fetch unit of
 * one fetcher. The watermark is reserved before sleeping so concurrent
 * callers queue up one interval apart.
 */
export class RateLimiter {
  private lastRequestAt = 0;

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = Date.now,
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {}

  /** Milliseconds the caller slept. */
  async acquire(): Promise<number> {
    const current = this.now();
    const slot = Math.max(current, this.lastRequestAt + this.minIntervalMs);
    this.lastRequestAt = slot;

    const delay = slot - current;
    if (delay > 0) {
      await this.wait(delay);
    }
    return delay;
  }
}
