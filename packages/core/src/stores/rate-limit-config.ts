/**
 * Account id that turns off all rate-limit bookkeeping for a call. Used for
 * internal calls that must never be throttled.
 */
export const SKIP_RATE_LIMITING = '<SKIP_RATE_LIMITING>';

export const RATE_LIMIT_REMAINING_HEADER = 'x-ratelimit-remaining';
export const RATE_LIMIT_USED_HEADER = 'x-ratelimit-used';
export const RATE_LIMIT_RESET_HEADER = 'x-ratelimit-reset';

/**
 * What the gate does when the shared store fails during a throttle check.
 *
 * - `fail-closed`: the request fails with `StoreUnavailableError`.
 * - `fail-open`: the failure is logged and the request proceeds.
 */
export type StoreFailureMode = 'fail-closed' | 'fail-open';

/**
 * Configuration for the rate-limit gate.
 *
 * This interface is shared by the gate and the client options so that callers
 * can use a single canonical type.
 */
export interface RateLimitGateConfig {
  /** Remaining quota at or below which an account is put on cool-down */
  safetyBuffer: number;
  /** Used count above which the snapshot is kept for operators */
  abnormalUsageThreshold: number;
  storeFailureMode: StoreFailureMode;
}

export const DEFAULT_RATE_LIMIT_GATE: RateLimitGateConfig = {
  safetyBuffer: 50,
  abnormalUsageThreshold: 2000,
  storeFailureMode: 'fail-closed',
};

export const REQUEST_COUNT_KEY = 'reddit:requests';
export const ABNORMAL_USAGE_KEY = 'reddit:ratelimited:crazy';

export function coolDownKey(accountId: string): string {
  return `reddit:${accountId}:ratelimited`;
}
