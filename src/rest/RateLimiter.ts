import { sleep } from '@/utils/sleep';

export interface RateLimitBucket {
  id: string;
  limit: number;
  remaining: number;
  /** Epoch seconds, as reported by `X-RateLimit-Reset`. */
  reset: number;
  /** Seconds, as reported by `X-RateLimit-Reset-After`. */
  resetAfter: number;
  /** Epoch milliseconds at which the window ends. */
  resetAt: number;
  recordedAt: number;
}

export type HeaderSource = Pick<Headers, 'get'>;

function readNumber(headers: HeaderSource, name: string): number | null {
  const raw = headers.get(name);
  if (raw === null) return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

/**
 * Tracks the per-route buckets the API reports in its `X-RateLimit-*`
 * headers and holds requests back while their bucket is exhausted.
 */
export class RateLimiter {
  private buckets: Map<string, RateLimitBucket> = new Map();
  private routes: Map<string, string> = new Map();

  private routeKey(route: string, method: string): string {
    return `${method.toUpperCase()} ${route}`;
  }

  record(route: string, method: string, headers: HeaderSource): void {
    const id = headers.get('x-ratelimit-bucket');
    if (id === null) return;

    const now = Date.now();
    const limit = readNumber(headers, 'x-ratelimit-limit');
    const remaining = readNumber(headers, 'x-ratelimit-remaining');
    const resetAfter = readNumber(headers, 'x-ratelimit-reset-after') ?? 0;
    const reset = readNumber(headers, 'x-ratelimit-reset') ?? now / 1000 + resetAfter;

    const bucket: RateLimitBucket = {
      id,
      limit: limit ?? remaining ?? 1,
      remaining: remaining ?? 0,
      reset,
      resetAfter,
      resetAt: now + resetAfter * 1000,
      recordedAt: now
    };

    this.buckets.set(id, bucket);
    this.routes.set(this.routeKey(route, method), id);
  }

  getBucket(route: string, method: string): RateLimitBucket | null {
    const id = this.routes.get(this.routeKey(route, method));
    if (id === undefined) return null;
    return this.buckets.get(id) ?? null;
  }

  /** Milliseconds a request on this route would have to wait right now. */
  getWaitTime(route: string, method: string): number {
    const bucket = this.getBucket(route, method);
    if (!bucket || bucket.remaining > 0) return 0;
    return Math.max(0, bucket.resetAt - Date.now());
  }

  canProceed(route: string, method: string): boolean {
    return this.getWaitTime(route, method) === 0;
  }

  async waitForAvailability(route: string, method: string): Promise<void> {
    const bucket = this.getBucket(route, method);
    if (!bucket) return;

    const waitTime = bucket.remaining > 0 ? 0 : bucket.resetAt - Date.now();
    if (waitTime > 0) {
      await sleep(waitTime);
      bucket.remaining = bucket.limit;
    } else if (bucket.remaining <= 0) {
      // The window ended without a response refreshing it.
      bucket.remaining = bucket.limit;
    }

    bucket.remaining--;
  }

  clear(): void {
    this.buckets.clear();
    this.routes.clear();
  }
}
