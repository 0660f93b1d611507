import { DebugLogger } from '@shardline/debug-logger';
import { API_HOST, API_VERSION, DEFAULT_REQUEST_TTL, DEFAULT_RETRY_AFTER, USER_AGENT } from '@/constants';
import { HTTP_ERRORS, ServerError, toError } from '@/errors';
import { sleep } from '@/utils/sleep';
import { RateLimiter } from './RateLimiter';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean | null | undefined>;

export interface RequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
  /** `null` and `undefined` values are left out of the query string. */
  params?: QueryParams;
  /** Sent as `X-Audit-Log-Reason`. */
  reason?: string;
}

export type FetchFunction = (input: string, init: RequestInit) => Promise<Response>;

export interface RestClientOptions {
  token: string;
  apiVersion?: number;
  host?: string;
  /** Attempts per request for server errors and network failures. */
  ttl?: number;
  userAgent?: string;
  fetch?: FetchFunction;
  rateLimiter?: RateLimiter;
  logger?: DebugLogger;
}

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) return null;

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

function readRetryAfter(body: unknown): number {
  if (typeof body === 'object' && body !== null && 'retry_after' in body && typeof body.retry_after === 'number') {
    return body.retry_after;
  }
  return DEFAULT_RETRY_AFTER;
}

/**
 * HTTP transport for the REST API.
 *
 * Every request goes through the rate limiter first. A 429 is waited out and
 * re-sent without touching the retry budget; client errors fail at once;
 * anything else is retried `ttl` times with a growing delay.
 */
export class RestClient {
  readonly baseUrl: string;
  readonly rateLimiter: RateLimiter;

  private readonly token: string;
  private readonly maxTtl: number;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchFunction;
  private readonly logger: DebugLogger;

  constructor(options: RestClientOptions) {
    this.token = options.token;
    this.baseUrl = `https://${options.host ?? API_HOST}/api/v${options.apiVersion ?? API_VERSION}`;
    this.maxTtl = options.ttl ?? DEFAULT_REQUEST_TTL;
    this.userAgent = options.userAgent ?? USER_AGENT;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.rateLimiter = options.rateLimiter ?? new RateLimiter();
    this.logger = options.logger ?? new DebugLogger({ namespace: 'rest' });
  }

  get(route: string, options: Omit<RequestOptions, 'body'> = {}): Promise<unknown> {
    return this.request('GET', route, options);
  }

  post(route: string, options: RequestOptions = {}): Promise<unknown> {
    return this.request('POST', route, options);
  }

  put(route: string, options: RequestOptions = {}): Promise<unknown> {
    return this.request('PUT', route, options);
  }

  patch(route: string, options: RequestOptions = {}): Promise<unknown> {
    return this.request('PATCH', route, options);
  }

  delete(route: string, options: RequestOptions = {}): Promise<unknown> {
    return this.request('DELETE', route, options);
  }

  /** Resolves with the decoded JSON body, or `null` for an empty one. */
  async request(method: HttpMethod, route: string, options: RequestOptions = {}): Promise<unknown> {
    const url = this.buildUrl(route, options.params);
    const init = this.buildInit(method, options);
    let ttl = this.maxTtl;

    for (;;) {
      await this.rateLimiter.waitForAvailability(route, method);

      let response: Response;
      try {
        response = await this.fetchImpl(url, init);
      } catch (error) {
        this.logger.logWarn(`${method} ${route} failed`, { error: toError(error) });
        ttl = await this.retry(method, route, ttl, { cause: error });
        continue;
      }

      this.rateLimiter.record(route, method, response.headers);
      const body = await readBody(response);

      if (response.ok) {
        this.logger.logDebug(`${method} ${route} -> ${response.status}`);
        return body;
      }

      if (response.status === 429) {
        const retryAfter = readRetryAfter(body);
        this.logger.logWarn(`Rate limited on ${method} ${route}, retrying in ${retryAfter}s`);
        await sleep(retryAfter * 1000);
        continue;
      }

      const ErrorClass = HTTP_ERRORS.get(response.status);
      if (ErrorClass) {
        throw new ErrorClass(`${method} ${route} failed with ${response.status} ${response.statusText}`.trim(), {
          method,
          route,
          status: response.status,
          body
        });
      }

      this.logger.logWarn(`${method} ${route} -> ${response.status}`);
      ttl = await this.retry(method, route, ttl, { status: response.status, body });
    }
  }

  /** Waits before the next attempt and returns the remaining budget. */
  private async retry(
    method: string,
    route: string,
    ttl: number,
    details: { status?: number; body?: unknown; cause?: unknown }
  ): Promise<number> {
    if (ttl <= 1) {
      throw new ServerError(`Maximum amount of retries for \`${route}\`.`, { method, route, ...details });
    }

    const retryIn = 1 + (this.maxTtl - ttl) * 2;
    await sleep(retryIn * 1000);
    return ttl - 1;
  }

  private buildUrl(route: string, params?: QueryParams): string {
    const url = new URL(`${this.baseUrl}/${route.replace(/^\/+/, '')}`);
    if (params) {
      for (const [key, value] of Object.entries(params)) {
        if (value !== null && value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }
    return url.toString();
  }

  private buildInit(method: HttpMethod, options: RequestOptions): RequestInit {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Authorization: `Bot ${this.token}`,
      'User-Agent': this.userAgent,
      ...options.headers
    };

    if (options.reason !== undefined) {
      headers['X-Audit-Log-Reason'] = encodeURIComponent(options.reason);
    }

    const init: RequestInit = { method, headers };
    if (options.body !== undefined) {
      init.body = JSON.stringify(options.body);
    }
    return init;
  }
}
