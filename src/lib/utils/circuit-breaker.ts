// lib/utils/circuit-breaker.ts

export interface CircuitBreakerOptions {
  threshold: number;
  /** After this long open, one trial call is let through. 0 disables the half-open trial. */
  cooldownMs: number;
}

/**
 * Consecutive-failure counter for one channel. Open once the counter reaches
 * the threshold; a success decrements it.
 */
export class CircuitBreaker {
  private failures = 0;
  private openedAt: number | null = null;

  constructor(
    readonly name: string,
    private readonly options: CircuitBreakerOptions,
    private readonly now: () => number = Date.now
  ) {}

  get failureCount(): number {
    return this.failures;
  }

  isOpen(): boolean {
    if (this.failures < this.options.threshold) return false;
    if (this.options.cooldownMs > 0 && this.openedAt !== null) {
      return this.now() - this.openedAt < this.options.cooldownMs;
    }
    return true;
  }

  recordSuccess(): void {
    this.failures = Math.max(0, this.failures - 1);
    if (this.failures < this.options.threshold) {
      this.openedAt = null;
    }
  }

  recordFailure(): void {
    this.failures++;
    if (this.failures >= this.options.threshold) {
      if (this.openedAt === null) {
        console.warn(`⚠️ Circuit open for ${this.name} after ${this.failures} consecutive failures`);
      }
      this.openedAt = this.now();
    }
  }
}
