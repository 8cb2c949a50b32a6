/**
 * Raised when a rate-limit slot could not be acquired in time.
 * The orchestrator counts it as a retryable failure of the attempt.
 */
export class RateLimitTimeoutError extends Error {
  constructor(
    public readonly rate_limit_class: string,
    public readonly timeout_ms: number,
  ) {
    super(
      `Rate limit slot for "${rate_limit_class}" not available within ${timeout_ms}ms`,
    );
    this.name = "RateLimitTimeoutError";
  }
}
