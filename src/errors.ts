/**
 * Base class for every error thrown by the library.
 *
 * `instanceof ShardlineError` catches all of them; the subclasses below allow
 * precise handling (`instanceof LoginFailure` to stop retrying, and so on).
 */
export class ShardlineError extends Error {
  override name = 'ShardlineError';
}

// ---------------------------------------------------------------------------
// REST
// ---------------------------------------------------------------------------

export interface HTTPErrorDetails {
  method: string;
  route: string;
  /** Absent when the request never got a response. */
  status?: number;
  body?: unknown;
  cause?: unknown;
}

export class HTTPError extends ShardlineError {
  override name = 'HTTPError';
  readonly method: string;
  readonly route: string;
  readonly status: number | null;
  readonly body: unknown;

  constructor(message: string, details: HTTPErrorDetails) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.method = details.method;
    this.route = details.route;
    this.status = details.status ?? null;
    this.body = details.body ?? null;
  }
}

/** 304 */
export class NotModifiedError extends HTTPError {
  override name = 'NotModifiedError';
}

/** 400 */
export class BadRequestError extends HTTPError {
  override name = 'BadRequestError';
}

/** 401 */
export class UnauthorizedError extends HTTPError {
  override name = 'UnauthorizedError';
}

/** 403 */
export class ForbiddenError extends HTTPError {
  override name = 'ForbiddenError';
}

/** 404 */
export class NotFoundError extends HTTPError {
  override name = 'NotFoundError';
}

/** 405 */
export class MethodNotAllowedError extends HTTPError {
  override name = 'MethodNotAllowedError';
}

/**
 * 429. The transport waits and retries these itself; the class exists for
 * callers inspecting errors by kind.
 */
export class RateLimitError extends HTTPError {
  override name = 'RateLimitError';
}

/** 5xx and network failures once the retry budget is spent. */
export class ServerError extends HTTPError {
  override name = 'ServerError';
}

export type HTTPErrorConstructor = new (message: string, details: HTTPErrorDetails) => HTTPError;

/** Statuses that fail a request immediately, without retrying. */
export const HTTP_ERRORS: ReadonlyMap<number, HTTPErrorConstructor> = new Map<number, HTTPErrorConstructor>([
  [304, NotModifiedError],
  [400, BadRequestError],
  [401, UnauthorizedError],
  [403, ForbiddenError],
  [404, NotFoundError],
  [405, MethodNotAllowedError]
]);

// ---------------------------------------------------------------------------
// Gateway
// ---------------------------------------------------------------------------

export class GatewayError extends ShardlineError {
  override name = 'GatewayError';

  constructor(message: string, readonly shardId: number, readonly code: number | null = null) {
    super(message);
  }
}

/** The token was rejected. Retrying with the same token cannot succeed. */
export class LoginFailure extends GatewayError {
  override name = 'LoginFailure';
}

/**
 * The session asked for privileged intents that are not enabled for the
 * application in the developer portal.
 */
export class PrivilegedIntentsRequired extends GatewayError {
  override name = 'PrivilegedIntentsRequired';

  constructor(shardId: number, code: number | null = null) {
    super(
      `Shard ID ${shardId} is requesting privileged intents that have not been explicitly enabled in the ` +
        'developer portal. Enable them at https://discord.com/developers/applications/',
      shardId,
      code
    );
  }
}

/** The connection kept closing and the reconnect budget ran out. */
export class ConnectionClosed extends GatewayError {
  override name = 'ConnectionClosed';

  constructor(shardId: number, code: number) {
    super(`Websocket with shard ID ${shardId} closed with code ${code}`, shardId, code);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
