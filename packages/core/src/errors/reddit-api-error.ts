/**
 * Closed set of failure kinds a caller can act on.
 */
export type RedditErrorKind =
  | 'timeout'
  | 'rate_limited'
  | 'oauth_revoked'
  | 'server_error'
  | 'store_unavailable'
  | 'parse_error'
  | 'cancelled'
  | 'requires_account_id'
  | 'generic';

export interface RedditApiErrorOptions {
  /** HTTP status code, when the failure came from a response. */
  statusCode?: number;
  /** Response headers from the failed request. */
  headers?: Record<string, string>;
  /** Underlying error. */
  cause?: unknown;
}

/**
 * Base error class for every failure surfaced by the client.
 * A plain `RedditApiError` is the `generic` kind.
 */
export class RedditApiError extends Error {
  public readonly kind: RedditErrorKind;
  public readonly statusCode?: number;
  /** Response headers from the failed request. */
  public readonly headers?: Record<string, string>;

  constructor(
    message: string,
    options: RedditApiErrorOptions = {},
    kind: RedditErrorKind = 'generic',
  ) {
    super(message, { cause: options.cause });
    this.name = 'RedditApiError';
    this.kind = kind;
    this.statusCode = options.statusCode;
    this.headers = options.headers;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Response headers did not arrive within the transport's header timeout. */
export class TimeoutError extends RedditApiError {
  constructor(message = 'Timed out awaiting response headers', cause?: unknown) {
    super(message, { cause }, 'timeout');
    this.name = 'TimeoutError';
  }
}

/** The account is cooling down; the request was never sent. */
export class RateLimitedError extends RedditApiError {
  public readonly accountId: string;

  constructor(accountId: string) {
    super(`Account ${accountId} is rate limited`, {}, 'rate_limited');
    this.name = 'RateLimitedError';
    this.accountId = accountId;
  }
}

/**
 * The credential is revoked or expired. Never retried: the caller has to
 * re-authorize the account.
 */
export class OauthRevokedError extends RedditApiError {
  constructor(options: RedditApiErrorOptions = {}) {
    super('OAuth credential has been revoked', options, 'oauth_revoked');
    this.name = 'OauthRevokedError';
  }
}

export class ServerError extends RedditApiError {
  declare readonly statusCode: number;

  constructor(statusCode: number, headers?: Record<string, string>) {
    super(`Reddit API responded with status ${statusCode}`, { statusCode, headers }, 'server_error');
    this.name = 'ServerError';
  }
}

/** The shared key-value store could not be reached or rejected a command. */
export class StoreUnavailableError extends RedditApiError {
  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Shared store ${operation} failed: ${reason}`, { cause }, 'store_unavailable');
    this.name = 'StoreUnavailableError';
  }
}

export class ParseError extends RedditApiError {
  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to parse response body: ${reason}`, { cause }, 'parse_error');
    this.name = 'ParseError';
  }
}

/**
 * The caller's signal was aborted. Named `AbortError` so code that checks
 * `error.name` the way it does for fetch keeps working.
 */
export class RequestCancelledError extends RedditApiError {
  constructor(cause?: unknown) {
    super('Request was cancelled', { cause }, 'cancelled');
    this.name = 'AbortError';
  }
}

/** Rate-limit bookkeeping was attempted for the bypass account. */
export class RequiresAccountIdError extends RedditApiError {
  constructor() {
    super('Rate-limit bookkeeping requires an account id', {}, 'requires_account_id');
    this.name = 'RequiresAccountIdError';
  }
}

export function isRedditApiError(value: unknown): value is RedditApiError {
  return value instanceof RedditApiError;
}
