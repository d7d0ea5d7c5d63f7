import type { Logger } from 'pino';
import { classifyError, isRetryable } from '../errors/classify.js';
import {
  RateLimitedError,
  RedditApiError,
  RequestCancelledError,
  ServerError,
} from '../errors/reddit-api-error.js';
import type { MetricsSink } from '../metrics/metrics-sink.js';
import type { RateLimitGate } from '../rate-limit/rate-limit-gate.js';
import { parseRateLimitHeaders } from '../rate-limit/snapshot.js';
import { SKIP_RATE_LIMITING } from '../stores/rate-limit-config.js';
import type { RequestDescriptor } from './request.js';
import { DEFAULT_BACKOFF_SCHEDULE_MS, sleep as defaultSleep, type Sleep } from './sleep.js';
import type { Transport, TransportResponse } from './transport.js';

export interface RequestOrchestratorOptions {
  transport: Pick<Transport, 'send'>;
  gate: RateLimitGate;
  metrics: MetricsSink;
  logger: Logger;
  backoffScheduleMs?: ReadonlyArray<number>;
  sleep?: Sleep;
}

/**
 * Sends one logical request for an account: throttle check, send, retries on
 * the backoff schedule, then rate-limit bookkeeping.
 */
export class RequestOrchestrator {
  private readonly transport: Pick<Transport, 'send'>;
  private readonly gate: RateLimitGate;
  private readonly metrics: MetricsSink;
  private readonly logger: Logger;
  private readonly backoffScheduleMs: ReadonlyArray<number>;
  private readonly sleep: Sleep;

  constructor({
    transport,
    gate,
    metrics,
    logger,
    backoffScheduleMs = DEFAULT_BACKOFF_SCHEDULE_MS,
    sleep = defaultSleep,
  }: RequestOrchestratorOptions) {
    this.transport = transport;
    this.gate = gate;
    this.metrics = metrics;
    this.logger = logger;
    this.backoffScheduleMs = backoffScheduleMs;
    this.sleep = sleep;
  }

  /**
   * Resolves with the raw body of a 200 response, or rejects with a
   * classified `RedditApiError`.
   */
  async execute(accountId: string, descriptor: RequestDescriptor): Promise<Buffer> {
    let throttled: boolean;
    try {
      throttled = await this.gate.isThrottled(accountId);
    } catch (error) {
      this.metrics.increment('reddit.api.errors', descriptor.tags, 0.1);
      throw error;
    }
    if (throttled) {
      this.metrics.increment('reddit.api.errors', descriptor.tags, 0.1);
      throw new RateLimitedError(accountId);
    }

    let outcome = await this.attempt(accountId, descriptor);

    if (outcome instanceof RedditApiError && descriptor.retry) {
      for (const [index, backoffMs] of this.backoffScheduleMs.entries()) {
        if (!isRetryable(outcome)) break;

        this.logger.warn(
          { accountId, url: descriptor.url, attempt: index + 2, backoffMs, err: outcome },
          'retrying request',
        );

        try {
          await this.sleep(backoffMs, descriptor.signal);
        } catch (error) {
          outcome = classifyError(error, descriptor.classification);
          break;
        }

        this.metrics.increment('reddit.api.retries', descriptor.tags, 0.1);
        outcome = await this.attempt(accountId, descriptor);
        if (!(outcome instanceof RedditApiError)) break;
      }
    }

    if (outcome instanceof RedditApiError) {
      this.metrics.increment('reddit.api.errors', descriptor.tags, 0.1);
      throw outcome;
    }

    if (accountId !== SKIP_RATE_LIMITING) {
      await this.recordUsage(accountId, outcome);
    }

    return outcome.body;
  }

  /** One send. Failures are returned, classified, rather than thrown. */
  private async attempt(
    accountId: string,
    descriptor: RequestDescriptor,
  ): Promise<TransportResponse | RedditApiError> {
    if (descriptor.signal?.aborted) {
      return new RequestCancelledError(descriptor.signal.reason);
    }

    await this.countRequest(accountId);

    try {
      const response = await this.transport.send(descriptor);
      if (response.status !== 200) {
        return classifyError(
          new ServerError(response.status, response.headers),
          descriptor.classification,
        );
      }
      return response;
    } catch (error) {
      return classifyError(error, descriptor.classification);
    }
  }

  private async countRequest(accountId: string): Promise<void> {
    try {
      await this.gate.countRequest(accountId);
    } catch (error) {
      this.logger.warn({ err: error, accountId }, 'failed to count request');
    }
  }

  private async recordUsage(accountId: string, response: TransportResponse): Promise<void> {
    try {
      await this.gate.recordUsage(accountId, parseRateLimitHeaders(response.headers));
    } catch (error) {
      this.metrics.increment('reddit.api.ratelimit.store_errors', [], 1.0);
      this.logger.warn({ err: error, accountId }, 'failed to record rate-limit usage');
    }
  }
}
