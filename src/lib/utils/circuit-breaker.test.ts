import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CircuitBreaker } from "./circuit-breaker";

describe("CircuitBreaker", () => {
  let clock = 0;

  beforeEach(() => {
    clock = 1_000_000;
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("opens at the threshold and lets a trial through after the cooldown", () => {
    const breaker = new CircuitBreaker("browser_search", { threshold: 2, cooldownMs: 1_000 }, () => clock);

    breaker.recordFailure();
    expect(breaker.isOpen()).toBe(false);
    breaker.recordFailure();
    expect(breaker.isOpen()).toBe(true);

    clock += 500;
    expect(breaker.isOpen()).toBe(true);
    clock += 500;
    expect(breaker.isOpen()).toBe(false);

    // a failed trial re-opens for another cooldown
    breaker.recordFailure();
    expect(breaker.isOpen()).toBe(true);
    expect(breaker.failureCount).toBe(3);
  });

  it("closes once a success brings the count under the threshold", () => {
    const breaker = new CircuitBreaker("browser_search", { threshold: 2, cooldownMs: 0 }, () => clock);

    breaker.recordFailure();
    breaker.recordFailure();
    clock += 60_000;
    expect(breaker.isOpen()).toBe(true);

    breaker.recordSuccess();
    expect(breaker.failureCount).toBe(1);
    expect(breaker.isOpen()).toBe(false);
  });

  it("never drops below zero failures", () => {
    const breaker = new CircuitBreaker("browser_search", { threshold: 5, cooldownMs: 0 });
    breaker.recordSuccess();
    expect(breaker.failureCount).toBe(0);
  });
});
