import { describe, expect, it } from "vitest";
import { Semaphore, TokenBucketLimiter } from "../src/util/limiter.js";

describe("Semaphore", () => {
  it("hands slots out up to the limit and then queues", async () => {
    const sem = new Semaphore(2);
    expect(await sem.acquire()).toBe(true);
    expect(await sem.acquire()).toBe(true);
    expect(sem.inUse).toBe(2);

    let granted = false;
    const waiting = sem.acquire().then((ok) => {
      granted = ok;
    });
    await Promise.resolve();
    expect(granted).toBe(false);

    sem.release();
    await waiting;
    expect(granted).toBe(true);
    expect(sem.inUse).toBe(2);
  });

  it("serves waiters in arrival order", async () => {
    const sem = new Semaphore(1);
    await sem.acquire();
    const order: number[] = [];
    const first = sem.acquire().then(() => order.push(1));
    const second = sem.acquire().then(() => order.push(2));
    sem.release();
    sem.release();
    await Promise.all([first, second]);
    expect(order).toEqual([1, 2]);
  });

  it("gives up a queued acquire when its signal aborts", async () => {
    const sem = new Semaphore(1);
    await sem.acquire();
    const controller = new AbortController();
    const pending = sem.acquire(controller.signal);
    controller.abort();
    await expect(pending).resolves.toBe(false);

    sem.release();
    expect(sem.inUse).toBe(0);
  });

  it("refuses a limit below one", () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });
});

describe("TokenBucketLimiter", () => {
  it("allows a burst of rps calls without waiting", async () => {
    const limiter = new TokenBucketLimiter(3);
    const start = Date.now();
    for (let i = 0; i < 3; i++) await limiter.take();
    expect(Date.now() - start).toBeLessThan(30);
  });

  it("makes the next caller wait for a fresh token", async () => {
    const limiter = new TokenBucketLimiter(20);
    for (let i = 0; i < 20; i++) await limiter.take();
    const start = Date.now();
    await limiter.take();
    expect(Date.now() - start).toBeGreaterThanOrEqual(40);
  });

  it("stops waiting when the caller aborts", async () => {
    const limiter = new TokenBucketLimiter(1);
    await limiter.take();
    const controller = new AbortController();
    const pending = limiter.take(controller.signal);
    controller.abort();
    await expect(pending).rejects.toMatchObject({ name: "AbortError" });
  });

  it("refuses a non-positive rate", () => {
    expect(() => new TokenBucketLimiter(0)).toThrow(RangeError);
  });
});
