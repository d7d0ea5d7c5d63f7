import type { Logger } from 'pino';
import {
  RequiresAccountIdError,
  StoreUnavailableError,
} from '../errors/reddit-api-error.js';
import type { MetricsSink } from '../metrics/metrics-sink.js';
import {
  ABNORMAL_USAGE_KEY,
  DEFAULT_RATE_LIMIT_GATE,
  REQUEST_COUNT_KEY,
  SKIP_RATE_LIMITING,
  coolDownKey,
  type RateLimitGateConfig,
} from '../stores/rate-limit-config.js';
import type { SharedStore } from '../stores/shared-store.js';
import {
  deserializeSnapshot,
  serializeSnapshot,
  type RateLimitSnapshot,
} from './snapshot.js';

export interface RateLimitGateOptions {
  store: SharedStore;
  metrics: MetricsSink;
  logger: Logger;
  config?: Partial<RateLimitGateConfig>;
}

/**
 * Per-account throttle shared by every process through the store. An account
 * is throttled while its cool-down key exists; the key's expiry is the only
 * way it becomes unthrottled.
 */
export class RateLimitGate {
  private readonly store: SharedStore;
  private readonly metrics: MetricsSink;
  private readonly logger: Logger;
  readonly config: RateLimitGateConfig;

  constructor({ store, metrics, logger, config = {} }: RateLimitGateOptions) {
    this.store = store;
    this.metrics = metrics;
    this.logger = logger;
    this.config = { ...DEFAULT_RATE_LIMIT_GATE, ...config };
  }

  /**
   * Whether `accountId` is cooling down. Store failures reject with
   * `StoreUnavailableError` unless the gate runs in `fail-open` mode.
   */
  async isThrottled(accountId: string): Promise<boolean> {
    if (accountId === SKIP_RATE_LIMITING) {
      return false;
    }

    let value: string | undefined;
    try {
      value = await this.store.get(coolDownKey(accountId));
    } catch (error) {
      const storeError = new StoreUnavailableError('get', error);
      this.metrics.increment('reddit.api.ratelimit.store_errors', [], 1.0);

      if (this.config.storeFailureMode === 'fail-open') {
        this.logger.warn(
          { err: storeError, accountId },
          'rate-limit check failed, letting request through',
        );
        return false;
      }

      this.logger.error({ err: storeError, accountId }, 'rate-limit check failed');
      throw storeError;
    }

    return value !== undefined;
  }

  /**
   * Put the account on cool-down when the server reports that its remaining
   * quota is within the safety buffer.
   */
  async recordUsage(accountId: string, snapshot: RateLimitSnapshot): Promise<void> {
    if (accountId === SKIP_RATE_LIMITING) {
      throw new RequiresAccountIdError();
    }

    if (!snapshot.present) {
      return;
    }

    if (snapshot.remaining > this.config.safetyBuffer) {
      return;
    }

    this.metrics.increment('reddit.api.ratelimit', [], 1.0);

    const info = serializeSnapshot(snapshot);

    if (snapshot.used > this.config.abnormalUsageThreshold) {
      this.logger.warn(
        { accountId, used: snapshot.used },
        'abnormal request volume for account',
      );
      try {
        await this.store.setField(ABNORMAL_USAGE_KEY, accountId, info);
      } catch (error) {
        throw new StoreUnavailableError('setField', error);
      }
    }

    // A zero TTL cannot be represented with second granularity
    const ttlSeconds = Math.max(1, snapshot.reset);

    try {
      await this.store.setWithTTL(coolDownKey(accountId), info, ttlSeconds);
    } catch (error) {
      throw new StoreUnavailableError('setWithTTL', error);
    }

    this.logger.info(
      { accountId, remaining: snapshot.remaining, reset: ttlSeconds },
      'account cooling down',
    );
  }

  /** Count one outgoing request for the account. */
  async countRequest(accountId: string): Promise<void> {
    if (accountId === SKIP_RATE_LIMITING) {
      return;
    }

    try {
      await this.store.incrementField(REQUEST_COUNT_KEY, accountId, 1);
    } catch (error) {
      throw new StoreUnavailableError('incrementField', error);
    }
  }

  async getCoolDown(accountId: string): Promise<RateLimitSnapshot | undefined> {
    const value = await this.readStore('get', () =>
      this.store.get(coolDownKey(accountId)),
    );
    return value === undefined ? undefined : deserializeSnapshot(value);
  }

  async getAbnormalUsage(accountId: string): Promise<RateLimitSnapshot | undefined> {
    const value = await this.readStore('getField', () =>
      this.store.getField(ABNORMAL_USAGE_KEY, accountId),
    );
    return value === undefined ? undefined : deserializeSnapshot(value);
  }

  async getRequestCount(accountId: string): Promise<number> {
    const value = await this.readStore('getField', () =>
      this.store.getField(REQUEST_COUNT_KEY, accountId),
    );
    return value === undefined ? 0 : Number.parseInt(value, 10);
  }

  private async readStore(
    operation: string,
    read: () => Promise<string | undefined>,
  ): Promise<string | undefined> {
    try {
      return await read();
    } catch (error) {
      throw new StoreUnavailableError(operation, error);
    }
  }
}
