import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RateLimiter } from '../RateLimiter';

function rateLimitHeaders(remaining: number, resetAfter: number): Headers {
  return new Headers({
    'x-ratelimit-bucket': 'bucket-a',
    'x-ratelimit-limit': '5',
    'x-ratelimit-remaining': String(remaining),
    'x-ratelimit-reset': String(resetAfter),
    'x-ratelimit-reset-after': String(resetAfter)
  });
}

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('ignores responses without a bucket', () => {
    const limiter = new RateLimiter();

    limiter.record('users/1', 'GET', new Headers());

    expect(limiter.getBucket('users/1', 'GET')).toBeNull();
  });

  it('records the bucket for the route and method', () => {
    const limiter = new RateLimiter();

    limiter.record('users/1', 'GET', rateLimitHeaders(4, 2.5));

    expect(limiter.getBucket('users/1', 'GET')).toEqual({
      id: 'bucket-a',
      limit: 5,
      remaining: 4,
      reset: 2.5,
      resetAfter: 2.5,
      resetAt: 2500,
      recordedAt: 0
    });
    expect(limiter.getBucket('users/1', 'POST')).toBeNull();
  });

  it('lets unseen routes through at once', async () => {
    const limiter = new RateLimiter();

    await expect(limiter.waitForAvailability('guilds/1', 'GET')).resolves.toBeUndefined();
  });

  it('reserves quota for requests on a bucket with room left', async () => {
    const limiter = new RateLimiter();
    limiter.record('users/1', 'GET', rateLimitHeaders(2, 5));

    await limiter.waitForAvailability('users/1', 'GET');

    expect(limiter.getBucket('users/1', 'GET')?.remaining).toBe(1);
    expect(limiter.canProceed('users/1', 'GET')).toBe(true);
  });

  it('waits out an exhausted bucket until its window ends', async () => {
    const limiter = new RateLimiter();
    limiter.record('users/1', 'GET', rateLimitHeaders(0, 5));
    expect(limiter.getWaitTime('users/1', 'GET')).toBe(5000);
    expect(limiter.canProceed('users/1', 'GET')).toBe(false);

    let released = false;
    const waiting = limiter.waitForAvailability('users/1', 'GET').then(() => {
      released = true;
    });

    await vi.advanceTimersByTimeAsync(4999);
    expect(released).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await waiting;
    expect(released).toBe(true);
    expect(limiter.getBucket('users/1', 'GET')?.remaining).toBe(4);
  });

  it('does not wait once the window has passed', async () => {
    const limiter = new RateLimiter();
    limiter.record('users/1', 'GET', rateLimitHeaders(0, 1));
    vi.setSystemTime(1500);

    await limiter.waitForAvailability('users/1', 'GET');

    expect(limiter.getBucket('users/1', 'GET')?.remaining).toBe(4);
  });

  it('forgets everything on clear', () => {
    const limiter = new RateLimiter();
    limiter.record('users/1', 'GET', rateLimitHeaders(0, 5));

    limiter.clear();

    expect(limiter.getBucket('users/1', 'GET')).toBeNull();
    expect(limiter.getWaitTime('users/1', 'GET')).toBe(0);
  });
});
