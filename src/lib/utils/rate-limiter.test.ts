import { describe, expect, it } from "vitest";
import { RateLimiter } from "./rate-limiter";

describe("RateLimiter", () => {
  it("spaces requests by the minimum interval", async () => {
    let clock = 100_000;
    const waits: number[] = [];
    const limiter = new RateLimiter(5_000, () => clock, async (ms) => {
      waits.push(ms);
    });

    expect(await limiter.acquire()).toBe(0);
    expect(await limiter.acquire()).toBe(5_000);
    expect(await limiter.acquire()).toBe(10_000);

    clock = 120_000;
    expect(await limiter.acquire()).toBe(0);
    expect(waits).toEqual([5_000, 10_000]);
  });
});
