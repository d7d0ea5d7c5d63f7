import { Redis } from 'ioredis';

/** The Redis commands the shared store issues. A subset of the ioredis API. */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<string>;
  hincrby(key: string, field: string, increment: number): Promise<number>;
  hset(key: string, field: string, value: string): Promise<number>;
  hget(key: string, field: string): Promise<string | null>;
  quit(): Promise<string>;
  /** Drop the connection immediately, abandoning pending replies. */
  disconnect(): void;
}

export interface RedisConnectionOptions {
  /** Defaults to `redis://localhost:6379` */
  url?: string;
  /** Prepended to every key by the client */
  keyPrefix?: string;
  connectTimeoutMs?: number;
  commandTimeoutMs?: number;
  /** Fail fast by default so the gate's store-failure mode applies quickly */
  maxRetriesPerRequest?: number;
  enableOfflineQueue?: boolean;
}

export const DEFAULT_REDIS_CONNECTION: Required<Omit<RedisConnectionOptions, 'keyPrefix'>> = {
  url: 'redis://localhost:6379',
  connectTimeoutMs: 5_000,
  commandTimeoutMs: 3_000,
  maxRetriesPerRequest: 1,
  enableOfflineQueue: false,
};

/** Bridge an ioredis connection to the command port. */
export function fromIoredis(redis: Redis): RedisCommands {
  return {
    get: (key) => redis.get(key),
    setex: (key, seconds, value) => redis.setex(key, seconds, value),
    hincrby: (key, field, increment) => redis.hincrby(key, field, increment),
    hset: (key, field, value) => redis.hset(key, field, value),
    hget: (key, field) => redis.hget(key, field),
    quit: () => redis.quit(),
    disconnect: () => redis.disconnect(),
  };
}

/**
 * Open a lazily-connecting ioredis client. The first command triggers the
 * connection.
 */
export function createIoredisClient(options: RedisConnectionOptions = {}): Redis {
  const config = { ...DEFAULT_REDIS_CONNECTION, ...options };
  return new Redis(config.url, {
    keyPrefix: config.keyPrefix,
    connectTimeout: config.connectTimeoutMs,
    commandTimeout: config.commandTimeoutMs,
    maxRetriesPerRequest: config.maxRetriesPerRequest,
    enableOfflineQueue: config.enableOfflineQueue,
    lazyConnect: true,
  });
}
