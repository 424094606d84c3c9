import { setTimeout as sleep } from "node:timers/promises";

/**
 * Token bucket in front of the MCP tools: bursts of up to `rps` calls, then
 * `rps` per second. A waiting caller sleeps until the next token is due.
 */
export class TokenBucketLimiter {
  private capacity: number;
  private tokens: number;
  private last: number;

  constructor(readonly rps = 5) {
    if (!(rps > 0)) throw new RangeError(`rate must be > 0, got ${rps}`);
    this.capacity = Math.max(1, rps);
    this.tokens = this.capacity;
    this.last = Date.now();
  }

  private refill(): void {
    const now = Date.now();
    this.tokens = Math.min(this.capacity, this.tokens + ((now - this.last) / 1000) * this.rps);
    this.last = now;
  }

  /** Rejects with the signal's reason if it aborts while waiting. */
  async take(signal?: AbortSignal): Promise<void> {
    for (;;) {
      signal?.throwIfAborted();
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }
      await sleep(Math.ceil(((1 - this.tokens) / this.rps) * 1000), undefined, { signal });
    }
  }
}

/**
 * Counting semaphore bounding how many device requests are in flight.
 * Waiters are served in arrival order.
 */
export class Semaphore {
  private available: number;
  private waiters: Array<() => void> = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) throw new RangeError(`semaphore limit must be >= 1, got ${limit}`);
    this.available = limit;
  }

  get inUse(): number {
    return this.limit - this.available;
  }

  /**
   * Resolves true once a slot is held, or false if `signal` aborts first.
   * A false result holds nothing and must not be released.
   */
  acquire(signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return Promise.resolve(false);
    if (this.available > 0) {
      this.available -= 1;
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      const grant = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve(true);
      };
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== grant);
        resolve(false);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(grant);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next(); // slot passes straight to the next waiter
      return;
    }
    this.available = Math.min(this.limit, this.available + 1);
  }
}
