import { describe, expect, it } from 'vitest';

import { RateLimiter } from '../src/middleware/rate-limit.js';

describe('RateLimiter', () => {
  it('admits up to the limit inside one window', () => {
    let now = 0;
    const limiter = new RateLimiter({ maxRequests: 3, windowMs: 1_000, now: () => now });

    expect([limiter.canProceed(), limiter.canProceed(), limiter.canProceed()]).toEqual([true, true, true]);
    expect(limiter.canProceed()).toBe(false);

    now = 999;
    expect(limiter.canProceed()).toBe(false);
  });

  it('admits again once the oldest requests leave the window', () => {
    let now = 0;
    const limiter = new RateLimiter({ maxRequests: 2, windowMs: 1_000, now: () => now });
    limiter.canProceed();
    now = 500;
    limiter.canProceed();

    now = 1_000;
    expect(limiter.remaining()).toBe(1);
    expect(limiter.canProceed()).toBe(true);
    expect(limiter.canProceed()).toBe(false);
  });

  it('does not record refused requests', () => {
    let now = 0;
    const limiter = new RateLimiter({ maxRequests: 1, windowMs: 1_000, now: () => now });
    limiter.canProceed();
    now = 900;
    limiter.canProceed();

    now = 1_000;
    expect(limiter.canProceed()).toBe(true);
  });

  it('always admits when disabled', () => {
    const limiter = new RateLimiter({ maxRequests: 1, enabled: false });
    expect([limiter.canProceed(), limiter.canProceed(), limiter.canProceed()]).toEqual([true, true, true]);
    expect(limiter.remaining()).toBe(1);
  });

  it('reset() clears the history', () => {
    const limiter = new RateLimiter({ maxRequests: 1, windowMs: 60_000 });
    limiter.canProceed();
    expect(limiter.canProceed()).toBe(false);
    limiter.reset();
    expect(limiter.canProceed()).toBe(true);
  });

  it('defaults to 300 requests per 180 minutes', () => {
    const limiter = new RateLimiter();
    expect(limiter.maxRequests).toBe(300);
    expect(limiter.windowMs).toBe(10_800_000);
  });
});
