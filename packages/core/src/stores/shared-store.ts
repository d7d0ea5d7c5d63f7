/**
 * Cross-process key-value store that holds rate-limit state. Every method is
 * a single atomic operation; implementations must support per-key expiry with
 * second granularity.
 *
 * Implementations: `@reddit-relay/store-memory`, `@reddit-relay/store-sqlite`,
 * `@reddit-relay/store-dynamodb` and `@reddit-relay/store-redis`.
 */
export interface SharedStore {
  /** Value stored under `key`, or `undefined` when absent or expired. */
  get(key: string): Promise<string | undefined>;
  /** Store `value` under `key`, replacing any previous value and expiry. */
  setWithTTL(key: string, value: string, ttlSeconds: number): Promise<void>;
  /** Add `delta` to an integer field of a map and return the new value. */
  incrementField(mapKey: string, field: string, delta: number): Promise<number>;
  /** Set a field of a map. Map fields never expire. */
  setField(mapKey: string, field: string, value: string): Promise<void>;
  getField(mapKey: string, field: string): Promise<string | undefined>;
}
