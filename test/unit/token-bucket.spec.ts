import { describe, expect, it } from 'vitest';
import { TokenBucket } from '@session-insights/core';
import { ManualClock } from '../fixtures/clock';

describe('TokenBucket', () => {
  it('starts full and refuses consumption beyond the balance', () => {
    const clock = new ManualClock();
    const bucket = new TokenBucket(100, 10, clock);

    expect(bucket.tryConsume(80)).toBe(true);
    expect(bucket.availableTokens).toBe(20);

    expect(bucket.tryConsume(30)).toBe(false);
    expect(bucket.availableTokens).toBe(20);

    clock.advance(1_000);
    expect(bucket.availableTokens).toBe(30);
    expect(bucket.tryConsume(30)).toBe(true);
    expect(bucket.availableTokens).toBe(0);
  });

  it('never consumes part of a request', () => {
    const bucket = new TokenBucket(100, 10, new ManualClock());

    expect(bucket.tryConsume(150)).toBe(false);
    expect(bucket.availableTokens).toBe(100);

    expect(bucket.tryConsume(40)).toBe(true);
    expect(bucket.availableTokens).toBe(60);
  });

  it('clamps refill at capacity', () => {
    const clock = new ManualClock();
    const bucket = new TokenBucket(100, 10, clock);
    bucket.tryConsume(50);

    clock.advance(60 * 60 * 1_000);

    expect(bucket.availableTokens).toBe(100);
  });

  it('keeps the balance within bounds across consumption and refill', () => {
    const clock = new ManualClock();
    const bucket = new TokenBucket(50, 5, clock);
    const steps: Array<[advanceMs: number, amount: number]> = [
      [0, 30],
      [250, 25],
      [1_000, 7],
      [0, 60],
      [4_000, 12],
      [30_000, 50],
      [100, 1]
    ];

    for (const [advanceMs, amount] of steps) {
      clock.advance(advanceMs);
      bucket.tryConsume(amount);
      expect(bucket.availableTokens).toBeGreaterThanOrEqual(0);
      expect(bucket.availableTokens).toBeLessThanOrEqual(50);
    }
  });

  it('reports the wait after which the tokens can be consumed', () => {
    const clock = new ManualClock();
    const bucket = new TokenBucket(100, 10, clock);
    bucket.tryConsume(100);

    const waitSeconds = bucket.timeUntilAvailable(35);
    expect(waitSeconds).toBe(3.5);

    clock.advance(waitSeconds * 1_000);
    expect(bucket.timeUntilAvailable(35)).toBe(0);
    expect(bucket.tryConsume(35)).toBe(true);
  });

  it('reports no wait when the tokens are already there', () => {
    const bucket = new TokenBucket(100, 10, new ManualClock());

    expect(bucket.timeUntilAvailable(100)).toBe(0);
  });

  it('sizes a per-minute bucket to refill fully over sixty seconds', () => {
    const bucket = TokenBucket.perMinute(600, new ManualClock());

    expect(bucket.capacity).toBe(600);
    expect(bucket.refillRatePerSecond).toBe(10);
  });

  it('rejects invalid configuration and amounts', () => {
    expect(() => new TokenBucket(0, 1)).toThrow('capacity must be a positive number');
    expect(() => new TokenBucket(10, 0)).toThrow('refillRatePerSecond must be a positive number');

    const bucket = new TokenBucket(10, 1, new ManualClock());
    expect(() => bucket.tryConsume(-1)).toThrow(RangeError);
    expect(() => bucket.timeUntilAvailable(Number.NaN)).toThrow(RangeError);
  });
});
