/**
 * Counting semaphore for concurrency control.
 * Used by the rate limiter (per route class) and the pipeline worker pool.
 */
export class Semaphore {
  private permits: number;
  private readonly maxPermits: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    if (permits < 1) {
      throw new Error("Semaphore permits must be >= 1");
    }
    this.permits = permits;
    this.maxPermits = permits;
  }

  /**
   * Acquire a permit. Blocks if no permits available.
   */
  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  /**
   * Acquire a permit, giving up after `timeoutMs`.
   * Resolves false on timeout; the waiter is removed so no permit leaks.
   */
  async acquireWithin(timeoutMs: number): Promise<boolean> {
    if (this.permits > 0) {
      this.permits--;
      return true;
    }
    return new Promise<boolean>((resolve) => {
      const waiter = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        const index = this.waiting.indexOf(waiter);
        if (index !== -1) this.waiting.splice(index, 1);
        resolve(false);
      }, timeoutMs);
      this.waiting.push(waiter);
    });
  }

  /**
   * Release a permit. Wakes up a waiting acquirer if any.
   */
  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
      return;
    }
    if (this.permits >= this.maxPermits) {
      throw new Error(
        `Semaphore over-release: already at max permits (${this.maxPermits})`,
      );
    }
    this.permits++;
  }

  /**
   * Number of permits currently available.
   */
  get available(): number {
    return this.permits;
  }

  /** Number of acquirers currently blocked */
  get pending(): number {
    return this.waiting.length;
  }
}
