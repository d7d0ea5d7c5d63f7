import {
  OauthRevokedError,
  RedditApiError,
  RequestCancelledError,
  ServerError,
  type RedditErrorKind,
} from './reddit-api-error.js';

/**
 * Status codes that carry a special meaning on one endpoint. A status that is
 * not listed stays a `ServerError`.
 */
export type StatusClassification = Readonly<Partial<Record<number, 'oauth_revoked'>>>;

/** 400 from the token endpoint means the refresh token itself is revoked. */
export const REFRESH_TOKEN_CLASSIFICATION: StatusClassification = {
  400: 'oauth_revoked',
};

/** 403 from an endpoint that needs a valid access token. */
export const AUTHENTICATED_READ_CLASSIFICATION: StatusClassification = {
  403: 'oauth_revoked',
};

const NON_RETRYABLE_KINDS: ReadonlySet<RedditErrorKind> = new Set<RedditErrorKind>([
  'rate_limited',
  'oauth_revoked',
  'cancelled',
  'requires_account_id',
]);

function isAbortLike(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'AbortError' || ('code' in error && error.code === 'ABORT_ERR'))
  );
}

/**
 * Map any failure onto the error taxonomy, using the endpoint's table to
 * decide what a status code means there.
 */
export function classifyError(
  error: unknown,
  table: StatusClassification = {},
): RedditApiError {
  if (error instanceof ServerError) {
    if (table[error.statusCode] === 'oauth_revoked') {
      return new OauthRevokedError({
        statusCode: error.statusCode,
        headers: error.headers,
        cause: error,
      });
    }
    return error;
  }

  if (error instanceof RedditApiError) {
    return error;
  }

  if (isAbortLike(error)) {
    return new RequestCancelledError(error);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new RedditApiError(message, { cause: error });
}

export function isRetryable(error: RedditApiError): boolean {
  return !NON_RETRYABLE_KINDS.has(error.kind);
}
