import {
  RateLimitGate,
  StoreUnavailableError,
  createLogger,
  noopMetrics,
  parseRateLimitHeaders,
} from '@reddit-relay/core';
import { Redis } from 'ioredis';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RedisSharedStore } from './redis-shared-store.js';
import { FakeRedis } from './test/fake-redis.js';

describe('RedisSharedStore', () => {
  let redis: FakeRedis;
  let store: RedisSharedStore;

  beforeEach(() => {
    redis = new FakeRedis();
    store = new RedisSharedStore({ client: redis });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('keys with expiry', () => {
    it('should write keys with SETEX', async () => {
      await store.setWithTTL('reddit:account-1:ratelimited', '{}', 240);

      expect(redis.commands).toEqual([['SETEX', 'reddit:account-1:ratelimited', 240, '{}']]);
      await expect(store.get('reddit:account-1:ratelimited')).resolves.toBe('{}');
    });

    it('should round partial seconds up and never send zero', async () => {
      await store.setWithTTL('a', 'x', 1.2);
      await store.setWithTTL('b', 'x', 0);

      expect(redis.commands).toEqual([
        ['SETEX', 'a', 2, 'x'],
        ['SETEX', 'b', 1, 'x'],
      ]);
    });

    it('should map a missing key to undefined', async () => {
      await expect(store.get('missing')).resolves.toBeUndefined();
    });

    it('should let Redis expire keys', async () => {
      vi.useFakeTimers();
      await store.setWithTTL('key1', 'value1', 10);

      vi.advanceTimersByTime(10_000);

      await expect(store.get('key1')).resolves.toBeUndefined();
    });
  });

  describe('map fields', () => {
    it('should increment hash fields with HINCRBY', async () => {
      await expect(store.incrementField('reddit:requests', 'account-1', 1)).resolves.toBe(1);
      await expect(store.incrementField('reddit:requests', 'account-1', 1)).resolves.toBe(2);

      expect(redis.commands[0]).toEqual(['HINCRBY', 'reddit:requests', 'account-1', 1]);
    });

    it('should set and read hash fields', async () => {
      await store.setField('reddit:ratelimited:crazy', 'account-1', '{"used":2100}');

      await expect(store.getField('reddit:ratelimited:crazy', 'account-1')).resolves.toBe(
        '{"used":2100}',
      );
      await expect(store.getField('reddit:ratelimited:crazy', 'account-2')).resolves.toBeUndefined();
    });
  });

  describe('lifecycle', () => {
    it('should leave a client it was given connected', async () => {
      await store.close();

      expect(redis.quitCalled).toBe(false);
      await expect(store.get('key1')).rejects.toThrow('Shared store has been destroyed');
    });

    it('should stop accepting commands after destroy without touching a given client', async () => {
      store.destroy();

      expect(redis.disconnectCalled).toBe(false);
      await expect(store.setField('map', 'a', 'x')).rejects.toThrow(
        'Shared store has been destroyed',
      );
    });

    it('should disconnect a connection it opened itself on destroy', () => {
      const disconnect = vi.spyOn(Redis.prototype, 'disconnect');
      const managed = new RedisSharedStore({ connection: { url: 'redis://127.0.0.1:6390' } });

      managed.destroy();
      managed.destroy();

      expect(disconnect).toHaveBeenCalledTimes(1);
    });
  });

  describe('with the rate-limit gate', () => {
    it('should record abnormal usage and cool the account down', async () => {
      const gate = new RateLimitGate({
        store,
        metrics: noopMetrics,
        logger: createLogger({ level: 'silent' }),
      });
      const snapshot = parseRateLimitHeaders(
        {
          'x-ratelimit-remaining': '0',
          'x-ratelimit-used': '2400',
          'x-ratelimit-reset': '90',
        },
        new Date('2024-01-01T00:00:00.000Z'),
      );

      await gate.recordUsage('account-1', snapshot);

      await expect(gate.isThrottled('account-1')).resolves.toBe(true);
      await expect(gate.getAbnormalUsage('account-1')).resolves.toEqual(snapshot);
      expect(redis.commands).toContainEqual([
        'SETEX',
        'reddit:account-1:ratelimited',
        90,
        JSON.stringify(snapshot),
      ]);
    });

    it('should surface Redis failures as an unavailable store', async () => {
      vi.spyOn(redis, 'get').mockRejectedValue(new Error('Connection is closed.'));
      const gate = new RateLimitGate({
        store,
        metrics: noopMetrics,
        logger: createLogger({ level: 'silent' }),
      });

      await expect(gate.isThrottled('account-1')).rejects.toBeInstanceOf(StoreUnavailableError);
    });
  });
});
