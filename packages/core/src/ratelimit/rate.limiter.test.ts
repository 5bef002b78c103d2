import { describe, it, expect } from 'vitest';
import { RateLimiter } from './rate.limiter.js';

/** Clock whose sleep advances time instead of waiting. */
function fakeClock(start = 0) {
  const sleeps: number[] = [];
  const clock = {
    time: start,
    sleeps,
    now: () => clock.time,
    sleep: async (ms: number) => {
      clock.sleeps.push(ms);
      clock.time += ms;
    },
  };
  return clock;
}

describe('RateLimiter', () => {
  it('lets rpm requests through without waiting', async () => {
    const clock = fakeClock();
    const limiter = new RateLimiter({ rpm: 3, now: clock.now, sleep: clock.sleep });

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(clock.sleeps).toEqual([]);
    expect(limiter.getCurrentRpm()).toBe(3);
  });

  it('suspends the next request until the oldest leaves the window', async () => {
    const clock = fakeClock();
    const limiter = new RateLimiter({ rpm: 2, now: clock.now, sleep: clock.sleep });

    await limiter.acquire();
    clock.time = 10_000;
    await limiter.acquire();
    clock.time = 20_000;

    expect(limiter.getWaitTime()).toBe(40_000);
    await limiter.acquire();

    expect(clock.sleeps).toEqual([40_000]);
    expect(clock.time).toBe(60_000);
    // The request at 0 has left the window; 10 000 and 60 000 remain.
    expect(limiter.getCurrentRpm()).toBe(2);
    expect(limiter.getWaitTime()).toBe(10_000);
  });

  it('does not register a timestamp while waiting at capacity', async () => {
    const clock = fakeClock();
    const limiter = new RateLimiter({ rpm: 1, windowMs: 1_000, now: clock.now, sleep: clock.sleep });

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(clock.sleeps).toEqual([1_000, 1_000]);
    expect(limiter.getCurrentRpm()).toBe(1);
  });

  it('serializes concurrent acquisitions', async () => {
    const clock = fakeClock();
    const limiter = new RateLimiter({ rpm: 2, windowMs: 1_000, now: clock.now, sleep: clock.sleep });

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    expect(clock.sleeps).toEqual([1_000]);
    expect(clock.time).toBe(1_000);
    expect(limiter.getCurrentRpm()).toBe(2);
  });

  it('projections never mutate the window', () => {
    const clock = fakeClock();
    const limiter = new RateLimiter({ rpm: 5, now: clock.now, sleep: clock.sleep });
    expect(limiter.getCurrentRpm()).toBe(0);
    expect(limiter.getWaitTime()).toBe(0);
  });

  it('rejects a non-positive rpm', () => {
    expect(() => new RateLimiter({ rpm: 0 })).toThrow(RangeError);
  });
});
