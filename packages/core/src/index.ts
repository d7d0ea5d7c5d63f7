export {
  RedditApiError,
  TimeoutError,
  RateLimitedError,
  OauthRevokedError,
  ServerError,
  StoreUnavailableError,
  ParseError,
  RequestCancelledError,
  RequiresAccountIdError,
  isRedditApiError,
} from './errors/reddit-api-error.js';
export type { RedditErrorKind, RedditApiErrorOptions } from './errors/reddit-api-error.js';
export {
  classifyError,
  isRetryable,
  REFRESH_TOKEN_CLASSIFICATION,
  AUTHENTICATED_READ_CLASSIFICATION,
} from './errors/classify.js';
export type { StatusClassification } from './errors/classify.js';

export type { SharedStore } from './stores/shared-store.js';
export {
  SKIP_RATE_LIMITING,
  RATE_LIMIT_REMAINING_HEADER,
  RATE_LIMIT_USED_HEADER,
  RATE_LIMIT_RESET_HEADER,
  DEFAULT_RATE_LIMIT_GATE,
  REQUEST_COUNT_KEY,
  ABNORMAL_USAGE_KEY,
  coolDownKey,
} from './stores/rate-limit-config.js';
export type { RateLimitGateConfig, StoreFailureMode } from './stores/rate-limit-config.js';

export {
  ABSENT_SNAPSHOT,
  parseRateLimitHeaders,
  serializeSnapshot,
  deserializeSnapshot,
} from './rate-limit/snapshot.js';
export type { RateLimitSnapshot } from './rate-limit/snapshot.js';
export { RateLimitGate } from './rate-limit/rate-limit-gate.js';
export type { RateLimitGateOptions } from './rate-limit/rate-limit-gate.js';

export { createRequest, requestUrl, encodeForm } from './http-client/request.js';
export type { HttpMethod, RequestDescriptor, RequestOptions } from './http-client/request.js';
export { DEFAULT_BACKOFF_SCHEDULE_MS, sleep } from './http-client/sleep.js';
export type { Sleep } from './http-client/sleep.js';
export {
  Transport,
  DEFAULT_TRANSPORT_OPTIONS,
  transportOptionsFromConnLimit,
  normalizeHeaders,
} from './http-client/transport.js';
export type { TransportOptions, TransportResponse, TransportInit } from './http-client/transport.js';
export { RequestOrchestrator } from './http-client/orchestrator.js';
export type { RequestOrchestratorOptions } from './http-client/orchestrator.js';
export { dispatch } from './http-client/dispatcher.js';
export type { Extractor } from './http-client/dispatcher.js';
export {
  RedditClient,
  AuthenticatedRedditClient,
  TOKEN_URL,
  OAUTH_BASE_URL,
  EMPTY_INBOX_BYTES,
} from './http-client/reddit-client.js';
export type { RedditClientDependencies, RequestTransport } from './http-client/reddit-client.js';
export type { AuthenticatedClientContract } from './types/http-client.js';

export * from './models/index.js';

export { validateClientOptions } from './config/client-options.js';
export type { RedditClientOptions, ResolvedClientOptions } from './config/client-options.js';

export { SafeMetrics, noopMetrics } from './metrics/metrics-sink.js';
export type { MetricsSink } from './metrics/metrics-sink.js';
export { InMemoryMetricsSink } from './metrics/in-memory-metrics-sink.js';
export type { MetricSample, MetricSnapshot } from './metrics/in-memory-metrics-sink.js';

export { createLogger, REDACTED_PATHS } from './logging/logger.js';
export type { Logger, LoggerOptions } from './logging/logger.js';
