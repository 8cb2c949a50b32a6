import { z } from "zod";

export const BackoffConfigSchema = z
  .object({
    base_ms: z.number().nonnegative(),
    max_ms: z.number().nonnegative(),
    factor: z.number().min(1),
    jitter: z.number().min(0).max(1), // e.g. 0.25 = ±25%
  })
  .strict();

export const RetryPolicySchema = z
  .object({
    max_attempts: z.number().int().min(1), // per route, first try included
    backoff: BackoffConfigSchema,
  })
  .strict();

export type BackoffConfig = z.infer<typeof BackoffConfigSchema>;
export type RetryPolicy = z.infer<typeof RetryPolicySchema>;

export const DEFAULT_BACKOFF: Readonly<BackoffConfig> = {
  base_ms: 1_000,
  max_ms: 30_000,
  factor: 2,
  jitter: 0.25,
};

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  max_attempts: 3,
  backoff: DEFAULT_BACKOFF,
};

/**
 * Discriminated result from withTimeout so a timeout is never confused
 * with a value the raced promise produced.
 */
export type TimeoutResult<T> =
  | { type: "resolved"; value: T }
  | { type: "timeout" };

/**
 * Race a promise against a timeout.
 * The raced promise is not cancelled; callers abort it through their own signal.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
): Promise<TimeoutResult<T>> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<{ type: "timeout" }>((resolve) => {
    timeoutId = setTimeout(() => {
      resolve({ type: "timeout" });
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      promise.then((value) => ({ type: "resolved" as const, value })),
      timeoutPromise,
    ]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Delay before retry number `attempt` (0-based): exponential, capped,
 * with symmetric jitter so concurrent identifiers do not retry in lockstep.
 */
export function calculateBackoff(
  attempt: number,
  config: BackoffConfig = DEFAULT_BACKOFF,
  random: () => number = Math.random,
): number {
  const delay = config.base_ms * config.factor ** attempt;
  const capped = Math.min(delay, config.max_ms);
  const jitterRange = capped * config.jitter;
  const jitterOffset = jitterRange * (random() * 2 - 1);
  return Math.max(0, Math.round(capped + jitterOffset));
}

/**
 * Sleep for `ms`. Resolves early (never rejects) when `signal` aborts,
 * so a cancelled run stops waiting between attempts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}
