import type { SharedStore } from '@reddit-relay/core';
import {
  createIoredisClient,
  fromIoredis,
  type RedisCommands,
  type RedisConnectionOptions,
} from './redis-commands.js';

export interface RedisSharedStoreOptions {
  /** Existing connection; `close()` and `destroy()` leave it open. */
  client?: RedisCommands;
  /** Used to open an ioredis connection when `client` is not given. */
  connection?: RedisConnectionOptions;
}

/**
 * `SharedStore` on Redis: `SETEX` for keys with expiry, hashes for map
 * fields. Redis expires keys itself, so reads need no clock check.
 */
export class RedisSharedStore implements SharedStore {
  private readonly redis: RedisCommands;
  private readonly isClientManaged: boolean;
  private isDestroyed = false;

  constructor({ client, connection }: RedisSharedStoreOptions = {}) {
    if (client) {
      this.redis = client;
      this.isClientManaged = false;
    } else {
      this.redis = fromIoredis(createIoredisClient(connection));
      this.isClientManaged = true;
    }
  }

  async get(key: string): Promise<string | undefined> {
    this.assertUsable();
    const value = await this.redis.get(key);
    return value ?? undefined;
  }

  async setWithTTL(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.assertUsable();
    // SETEX takes whole seconds and rejects zero
    await this.redis.setex(key, Math.max(1, Math.ceil(ttlSeconds)), value);
  }

  async incrementField(mapKey: string, field: string, delta: number): Promise<number> {
    this.assertUsable();
    return this.redis.hincrby(mapKey, field, delta);
  }

  async setField(mapKey: string, field: string, value: string): Promise<void> {
    this.assertUsable();
    await this.redis.hset(mapKey, field, value);
  }

  async getField(mapKey: string, field: string): Promise<string | undefined> {
    this.assertUsable();
    const value = await this.redis.hget(mapKey, field);
    return value ?? undefined;
  }

  async close(): Promise<void> {
    if (this.isDestroyed) {
      return;
    }
    this.isDestroyed = true;
    if (this.isClientManaged) {
      await this.redis.quit();
    }
  }

  destroy(): void {
    if (this.isDestroyed) {
      return;
    }
    this.isDestroyed = true;
    if (this.isClientManaged) {
      this.redis.disconnect();
    }
  }

  private assertUsable(): void {
    if (this.isDestroyed) {
      throw new Error('Shared store has been destroyed');
    }
  }
}
