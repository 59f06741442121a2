import { describe, test, expect, vi } from "vitest";
import { RateLimiter } from "../rate-limiter";
import { USER_AGENTS } from "../utils";

describe("RateLimiter", () => {
  test("delays stay within [min, max] over many draws", () => {
    const limiter = new RateLimiter({ minDelayMs: 1000, maxDelayMs: 3000 });
    for (let i = 0; i < 100; i++) {
      const seconds = limiter.nextDelayMs() / 1000;
      expect(seconds).toBeGreaterThanOrEqual(1);
      expect(seconds).toBeLessThanOrEqual(3);
    }
  });

  test("maps the random source onto the range", () => {
    const draws = [0, 0.25, 0.999999];
    const limiter = new RateLimiter({
      minDelayMs: 1000,
      maxDelayMs: 3000,
      random: () => draws.shift() ?? 0,
    });
    expect(limiter.nextDelayMs()).toBe(1000);
    expect(limiter.nextDelayMs()).toBe(1500);
    expect(limiter.nextDelayMs()).toBeCloseTo(2999.998, 3);
  });

  test("a zero-width range always yields the same delay", () => {
    const limiter = new RateLimiter({ minDelayMs: 0, maxDelayMs: 0 });
    expect(limiter.nextDelayMs()).toBe(0);
  });

  test("beforeRequest sleeps then hands out an agent from the pool", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const limiter = new RateLimiter({
      minDelayMs: 1000,
      maxDelayMs: 2000,
      userAgents: ["agent-a", "agent-b"],
      random: () => 0.5,
      sleep,
    });

    await expect(limiter.beforeRequest()).resolves.toBe("agent-b");
    expect(sleep).toHaveBeenCalledWith(1500);
  });

  test("uses the built-in pool by default", () => {
    const limiter = new RateLimiter({ minDelayMs: 0, maxDelayMs: 0 });
    expect(USER_AGENTS).toContain(limiter.nextUserAgent());
  });

  test("rejects an inverted range and an empty pool", () => {
    expect(() => new RateLimiter({ minDelayMs: 3000, maxDelayMs: 1000 })).toThrow(RangeError);
    expect(() => new RateLimiter({ minDelayMs: 0, maxDelayMs: 1, userAgents: [] })).toThrow(RangeError);
  });
});
