import type { RequestOptions } from '../http-client/request.js';
import type { MeResponse, SubredditResponse, UserResponse } from '../models/accounts.js';
import type { ListingResponse } from '../models/listing.js';
import type { RefreshTokenResponse } from '../models/refresh-token.js';

/**
 * Endpoints available on behalf of one account.
 *
 * Every method accepts optional request options that are layered over the
 * endpoint's own, primarily extra query parameters (`limit`, `after`), an
 * AbortSignal so callers can cancel long backoff waits, or `retry: false`.
 */
export interface AuthenticatedClientContract {
  readonly accountId: string;

  /**
   * Exchange the refresh token for a new access token. Rejects with
   * `OauthRevokedError` when the refresh token is no longer valid.
   */
  refreshTokens(options?: RequestOptions): Promise<RefreshTokenResponse>;
  /** Rejects with `OauthRevokedError` on 403. */
  me(options?: RequestOptions): Promise<MeResponse>;
  messageInbox(options?: RequestOptions): Promise<ListingResponse>;
  messageUnread(options?: RequestOptions): Promise<ListingResponse>;
  aboutInfo(fullname: string, options?: RequestOptions): Promise<ListingResponse>;
  userPosts(user: string, options?: RequestOptions): Promise<ListingResponse>;
  userAbout(user: string, options?: RequestOptions): Promise<UserResponse>;
  subredditAbout(subreddit: string, options?: RequestOptions): Promise<SubredditResponse>;
  subredditHot(subreddit: string, options?: RequestOptions): Promise<ListingResponse>;
  subredditTop(subreddit: string, options?: RequestOptions): Promise<ListingResponse>;
  subredditNew(subreddit: string, options?: RequestOptions): Promise<ListingResponse>;
}
