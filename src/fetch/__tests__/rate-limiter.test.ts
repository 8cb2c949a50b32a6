import { describe, expect, test } from "vitest";
import { RateLimitTimeoutError } from "../errors.js";
import { RateLimiter, RateLimiterRegistry } from "../rate-limiter.js";

describe("RateLimiter", () => {
  test("bounds concurrency to max_concurrent", async () => {
    const limiter = new RateLimiter("api", {
      max_concurrent: 2,
      min_interval_ms: 0,
    });
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, async () => {
        const release = await limiter.acquire(1_000);
        peak = Math.max(peak, limiter.inFlight);
        await new Promise((r) => setTimeout(r, 5));
        release();
      }),
    );

    expect(peak).toBe(2);
    expect(limiter.inFlight).toBe(0);
  });

  test("spaces request starts by min_interval_ms", async () => {
    const limiter = new RateLimiter("api", {
      max_concurrent: 3,
      min_interval_ms: 30,
    });
    const starts: number[] = [];

    await Promise.all(
      Array.from({ length: 3 }, async () => {
        const release = await limiter.acquire(1_000);
        starts.push(Date.now());
        release();
      }),
    );

    starts.sort((a, b) => a - b);
    // Allow a few ms of timer slack below the nominal interval
    expect(starts[1] - starts[0]).toBeGreaterThanOrEqual(25);
    expect(starts[2] - starts[1]).toBeGreaterThanOrEqual(25);
  });

  test("throws RateLimitTimeoutError when no slot frees up in time", async () => {
    const limiter = new RateLimiter("slow", {
      max_concurrent: 1,
      min_interval_ms: 0,
    });
    const release = await limiter.acquire(100);

    await expect(limiter.acquire(10)).rejects.toBeInstanceOf(
      RateLimitTimeoutError,
    );
    release();
    expect(limiter.inFlight).toBe(0);
  });

  test("times out when the interval wait would pass the deadline", async () => {
    const limiter = new RateLimiter("sparse", {
      max_concurrent: 2,
      min_interval_ms: 10_000,
    });
    const first = await limiter.acquire(100);

    await expect(limiter.acquire(50)).rejects.toThrow(
      'Rate limit slot for "sparse" not available within 50ms',
    );
    expect(limiter.inFlight).toBe(1);
    first();
    expect(limiter.inFlight).toBe(0);
  });

  test("release is idempotent", async () => {
    const limiter = new RateLimiter("api", {
      max_concurrent: 1,
      min_interval_ms: 0,
    });
    const release = await limiter.acquire(10);
    release();
    expect(() => release()).not.toThrow();
    expect(limiter.inFlight).toBe(0);
  });
});

describe("RateLimiterRegistry", () => {
  test("shares one limiter per class", () => {
    const registry = new RateLimiterRegistry();
    expect(registry.get("elsevier")).toBe(registry.get("elsevier"));
    expect(registry.get("elsevier")).not.toBe(registry.get("springer"));
  });

  test("uses class settings, falling back to the default", () => {
    const registry = new RateLimiterRegistry(
      { elsevier: { max_concurrent: 4, min_interval_ms: 250 } },
      { max_concurrent: 1, min_interval_ms: 1_000 },
    );
    expect(registry.get("elsevier").settings).toEqual({
      max_concurrent: 4,
      min_interval_ms: 250,
    });
    expect(registry.get("other").settings).toEqual({
      max_concurrent: 1,
      min_interval_ms: 1_000,
    });
  });
});
