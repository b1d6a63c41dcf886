import { describe, it, expect, vi } from 'vitest';
import { silentLogger } from '../../../__tests__/support/fakes';
import { SlidingWindowRateLimiter } from '../slidingWindowRateLimiter';

function fakeClock() {
  const clock = { now: 0 };
  const sleep = vi.fn(async (ms: number) => {
    clock.now += ms;
  });
  return { clock, sleep };
}

describe('SlidingWindowRateLimiter', () => {
  it('admits up to maxCalls in a window without waiting', async () => {
    const { clock, sleep } = fakeClock();
    const limiter = new SlidingWindowRateLimiter({
      maxCalls: 3,
      windowMs: 1_000,
      now: () => clock.now,
      sleep,
      logger: silentLogger(),
    });

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);
    expect(sleep).not.toHaveBeenCalled();
    expect(limiter.inWindow()).toBe(3);
  });

  it('blocks the next caller until the oldest call leaves the window', async () => {
    const { clock, sleep } = fakeClock();
    const limiter = new SlidingWindowRateLimiter({
      maxCalls: 3,
      windowMs: 1_000,
      now: () => clock.now,
      sleep,
      logger: silentLogger(),
    });

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(1_000);
    expect(clock.now).toBe(1_000);
    // The log is cleared after a wait; only the admitted call remains.
    expect(limiter.inWindow()).toBe(1);
  });

  it('waits only for the remainder of the oldest entry', async () => {
    const { clock, sleep } = fakeClock();
    const limiter = new SlidingWindowRateLimiter({
      maxCalls: 2,
      windowMs: 1_000,
      now: () => clock.now,
      sleep,
      logger: silentLogger(),
    });

    await limiter.acquire();
    clock.now = 600;
    await limiter.acquire();
    clock.now = 1_100;
    await limiter.acquire();
    expect(sleep).not.toHaveBeenCalled();

    await limiter.acquire();
    expect(sleep).toHaveBeenCalledWith(500);
    expect(clock.now).toBe(1_600);
  });

  it('rejects a non-positive limit', () => {
    expect(() => new SlidingWindowRateLimiter({ maxCalls: 0 })).toThrow('maxCalls must be a positive integer, got 0');
  });
});
