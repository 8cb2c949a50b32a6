import { z } from "zod";
import { RateLimitTimeoutError } from "./errors.js";
import { Semaphore } from "./semaphore.js";

export const RateLimitSettingsSchema = z
  .object({
    max_concurrent: z.number().int().min(1),
    min_interval_ms: z.number().int().nonnegative(),
  })
  .strict();

export type RateLimitSettings = z.infer<typeof RateLimitSettingsSchema>;

export const DEFAULT_RATE_LIMIT: Readonly<RateLimitSettings> = {
  max_concurrent: 1,
  min_interval_ms: 1_000,
};

/** Idempotent: calling it a second time is a no-op */
export type ReleaseSlot = () => void;

/**
 * Admission control for one route class: at most `max_concurrent`
 * requests in flight, and request starts spaced by `min_interval_ms`.
 */
export class RateLimiter {
  private readonly slots: Semaphore;
  private nextStartAt = 0;
  private active = 0;

  constructor(
    readonly name: string,
    readonly settings: RateLimitSettings,
    private readonly now: () => number = Date.now,
  ) {
    this.slots = new Semaphore(settings.max_concurrent);
  }

  get inFlight(): number {
    return this.active;
  }

  async acquire(timeoutMs: number): Promise<ReleaseSlot> {
    const deadline = this.now() + timeoutMs;
    const acquired = await this.slots.acquireWithin(timeoutMs);
    if (!acquired) {
      throw new RateLimitTimeoutError(this.name, timeoutMs);
    }

    // Reserve a start time before awaiting so concurrent acquirers queue
    // up behind each other instead of all waking at once.
    const current = this.now();
    const startAt = Math.max(current, this.nextStartAt);
    if (startAt > deadline) {
      this.slots.release();
      throw new RateLimitTimeoutError(this.name, timeoutMs);
    }
    this.nextStartAt = startAt + this.settings.min_interval_ms;

    const wait = startAt - current;
    if (wait > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, wait));
    }

    this.active++;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.active--;
      this.slots.release();
    };
  }
}

/** One shared limiter per route class, created on first use */
export class RateLimiterRegistry {
  private readonly limiters = new Map<string, RateLimiter>();

  constructor(
    private readonly settings: Readonly<Record<string, RateLimitSettings>> = {},
    private readonly fallback: RateLimitSettings = DEFAULT_RATE_LIMIT,
    private readonly now: () => number = Date.now,
  ) {}

  get(rateLimitClass: string): RateLimiter {
    let limiter = this.limiters.get(rateLimitClass);
    if (!limiter) {
      const settings = this.settings[rateLimitClass] ?? this.fallback;
      limiter = new RateLimiter(rateLimitClass, settings, this.now);
      this.limiters.set(rateLimitClass, limiter);
    }
    return limiter;
  }
}
