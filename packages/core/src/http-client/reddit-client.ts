import type { Logger } from 'pino';
import {
  AUTHENTICATED_READ_CLASSIFICATION,
  REFRESH_TOKEN_CLASSIFICATION,
} from '../errors/classify.js';
import {
  validateClientOptions,
  type RedditClientOptions,
  type ResolvedClientOptions,
} from '../config/client-options.js';
import { createLogger } from '../logging/logger.js';
import { SafeMetrics, noopMetrics, type MetricsSink } from '../metrics/metrics-sink.js';
import {
  extractMe,
  extractSubreddit,
  extractUser,
  type MeResponse,
  type SubredditResponse,
  type UserResponse,
} from '../models/accounts.js';
import { EMPTY_LISTING, extractListing, type ListingResponse } from '../models/listing.js';
import {
  extractRefreshToken,
  type RefreshTokenResponse,
} from '../models/refresh-token.js';
import { RateLimitGate } from '../rate-limit/rate-limit-gate.js';
import type { SharedStore } from '../stores/shared-store.js';
import type { AuthenticatedClientContract } from '../types/http-client.js';
import { dispatch, type Extractor } from './dispatcher.js';
import { RequestOrchestrator } from './orchestrator.js';
import { createRequest, type RequestDescriptor, type RequestOptions } from './request.js';
import type { Sleep } from './sleep.js';
import { Transport, transportOptionsFromConnLimit } from './transport.js';

export const TOKEN_URL = 'https://www.reddit.com/api/v1/access_token';
export const OAUTH_BASE_URL = 'https://oauth.reddit.com';

/** Byte length of the inbox endpoints' body when there are no messages */
export const EMPTY_INBOX_BYTES = 122;

export type RequestTransport = Pick<Transport, 'send' | 'destroy'>;

export interface RedditClientDependencies {
  store: SharedStore;
  metrics?: MetricsSink;
  logger?: Logger;
  /** Replaces the pooled transport built from the options */
  transport?: RequestTransport;
  sleep?: Sleep;
}

/**
 * Application-level client: holds the OAuth app credentials, the connection
 * pool and the shared rate-limit state. Per-account calls go through
 * `authenticated()`.
 */
export class RedditClient {
  readonly options: ResolvedClientOptions;
  readonly gate: RateLimitGate;
  readonly logger: Logger;
  private readonly transport: RequestTransport;
  private readonly orchestrator: RequestOrchestrator;

  constructor(dependencies: RedditClientDependencies, options: RedditClientOptions) {
    this.options = validateClientOptions(options);
    this.logger = dependencies.logger ?? createLogger();

    const metrics = new SafeMetrics(dependencies.metrics ?? noopMetrics, this.logger);

    this.transport =
      dependencies.transport ??
      new Transport({
        options: {
          ...transportOptionsFromConnLimit(this.options.connLimit),
          idleConnTimeoutMs: this.options.idleConnTimeoutMs,
          responseHeaderTimeoutMs: this.options.responseHeaderTimeoutMs,
          userAgent: this.options.userAgent,
        },
        metrics,
        logger: this.logger,
      });

    this.gate = new RateLimitGate({
      store: dependencies.store,
      metrics,
      logger: this.logger,
      config: {
        safetyBuffer: this.options.safetyBuffer,
        abnormalUsageThreshold: this.options.abnormalUsageThreshold,
        storeFailureMode: this.options.storeFailureMode,
      },
    });

    this.orchestrator = new RequestOrchestrator({
      transport: this.transport,
      gate: this.gate,
      metrics,
      logger: this.logger,
      backoffScheduleMs: this.options.backoffScheduleMs,
      sleep: dependencies.sleep,
    });
  }

  authenticated(
    accountId: string,
    refreshToken: string,
    accessToken: string,
  ): AuthenticatedRedditClient {
    if (accountId === '') {
      throw new Error('An authenticated client requires an account id');
    }
    return new AuthenticatedRedditClient(this, accountId, refreshToken, accessToken);
  }

  /**
   * Send a request for an account and map its body. When `empty` is given, a
   * body of exactly `descriptor.emptyResponseBytes` bytes resolves to it.
   */
  async request<T>(
    accountId: string,
    descriptor: RequestDescriptor,
    extract: Extractor<T>,
    empty?: T,
  ): Promise<T> {
    const raw = await this.orchestrator.execute(accountId, descriptor);
    if (empty === undefined) {
      return dispatch(raw, extract);
    }
    return dispatch(raw, extract, empty, descriptor.emptyResponseBytes);
  }

  /** Close pooled connections. */
  close(): void {
    this.transport.destroy();
  }
}

export class AuthenticatedRedditClient implements AuthenticatedClientContract {
  constructor(
    private readonly client: RedditClient,
    readonly accountId: string,
    private readonly refreshToken: string,
    private readonly accessToken: string,
  ) {}

  async refreshTokens(options: RequestOptions = {}): Promise<RefreshTokenResponse> {
    const request = createRequest(
      {
        tags: ['url:/api/v1/access_token'],
        method: 'POST',
        url: TOKEN_URL,
        form: { grant_type: 'refresh_token', refresh_token: this.refreshToken },
        basicAuth: {
          username: this.client.options.clientId,
          password: this.client.options.clientSecret,
        },
        classification: REFRESH_TOKEN_CLASSIFICATION,
      },
      options,
    );

    const response = await this.client.request(this.accountId, request, extractRefreshToken);

    // The server only sends a refresh token when it rotates it
    if (response.refreshToken === '') {
      return { ...response, refreshToken: this.refreshToken };
    }
    return response;
  }

  me(options: RequestOptions = {}): Promise<MeResponse> {
    const request = this.oauthRequest(
      {
        tags: ['url:/api/v1/me'],
        url: `${OAUTH_BASE_URL}/api/v1/me`,
        classification: AUTHENTICATED_READ_CLASSIFICATION,
      },
      options,
    );
    return this.client.request(this.accountId, request, extractMe);
  }

  messageInbox(options: RequestOptions = {}): Promise<ListingResponse> {
    return this.messages('inbox', options);
  }

  messageUnread(options: RequestOptions = {}): Promise<ListingResponse> {
    return this.messages('unread', options);
  }

  aboutInfo(fullname: string, options: RequestOptions = {}): Promise<ListingResponse> {
    const request = this.oauthRequest(
      {
        tags: ['url:/api/info'],
        url: `${OAUTH_BASE_URL}/api/info`,
        query: { id: fullname },
      },
      options,
    );
    return this.client.request(this.accountId, request, extractListing);
  }

  userPosts(user: string, options: RequestOptions = {}): Promise<ListingResponse> {
    const request = this.oauthRequest(
      {
        tags: ['url:/u/submitted'],
        url: `${OAUTH_BASE_URL}/u/${encodeURIComponent(user)}/submitted`,
      },
      options,
    );
    return this.client.request(this.accountId, request, extractListing);
  }

  userAbout(user: string, options: RequestOptions = {}): Promise<UserResponse> {
    const request = this.oauthRequest(
      {
        tags: ['url:/u/about'],
        url: `${OAUTH_BASE_URL}/u/${encodeURIComponent(user)}/about`,
      },
      options,
    );
    return this.client.request(this.accountId, request, extractUser);
  }

  subredditAbout(subreddit: string, options: RequestOptions = {}): Promise<SubredditResponse> {
    const request = this.oauthRequest(
      {
        tags: ['url:/r/about'],
        url: `${OAUTH_BASE_URL}/r/${encodeURIComponent(subreddit)}/about`,
      },
      options,
    );
    return this.client.request(this.accountId, request, extractSubreddit);
  }

  subredditHot(subreddit: string, options: RequestOptions = {}): Promise<ListingResponse> {
    return this.subredditPosts(subreddit, 'hot', options);
  }

  subredditTop(subreddit: string, options: RequestOptions = {}): Promise<ListingResponse> {
    return this.subredditPosts(subreddit, 'top', options);
  }

  subredditNew(subreddit: string, options: RequestOptions = {}): Promise<ListingResponse> {
    return this.subredditPosts(subreddit, 'new', options);
  }

  private subredditPosts(
    subreddit: string,
    sort: 'hot' | 'top' | 'new',
    options: RequestOptions,
  ): Promise<ListingResponse> {
    const request = this.oauthRequest(
      {
        tags: [`url:/r/${sort}`],
        url: `${OAUTH_BASE_URL}/r/${encodeURIComponent(subreddit)}/${sort}`,
      },
      options,
    );
    return this.client.request(this.accountId, request, extractListing);
  }

  private messages(
    folder: 'inbox' | 'unread',
    options: RequestOptions,
  ): Promise<ListingResponse> {
    const request = this.oauthRequest(
      {
        tags: [`url:/api/v1/message/${folder}`],
        url: `${OAUTH_BASE_URL}/message/${folder}`,
        emptyResponseBytes: EMPTY_INBOX_BYTES,
        classification: AUTHENTICATED_READ_CLASSIFICATION,
      },
      options,
    );
    return this.client.request(this.accountId, request, extractListing, EMPTY_LISTING);
  }

  private oauthRequest(
    endpoint: RequestOptions,
    overrides: RequestOptions,
  ): RequestDescriptor {
    return createRequest({ method: 'GET', token: this.accessToken }, endpoint, overrides);
  }
}
