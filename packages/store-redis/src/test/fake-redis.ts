import type { RedisCommands } from '../redis-commands.js';

/**
 * In-process stand-in for a Redis server, implementing only the commands the
 * shared store issues. Expiry follows `Date.now()`, so fake timers apply.
 */
export class FakeRedis implements RedisCommands {
  readonly commands: Array<Array<string | number>> = [];
  private readonly strings = new Map<string, { value: string; expiresAt: number }>();
  private readonly hashes = new Map<string, Map<string, string>>();
  quitCalled = false;
  disconnectCalled = false;

  async get(key: string): Promise<string | null> {
    this.commands.push(['GET', key]);
    const entry = this.strings.get(key);
    if (!entry || Date.now() >= entry.expiresAt) {
      this.strings.delete(key);
      return null;
    }
    return entry.value;
  }

  async setex(key: string, seconds: number, value: string): Promise<string> {
    this.commands.push(['SETEX', key, seconds, value]);
    if (!Number.isInteger(seconds) || seconds <= 0) {
      throw new Error('ERR invalid expire time in setex');
    }
    this.strings.set(key, { value, expiresAt: Date.now() + seconds * 1000 });
    return 'OK';
  }

  async hincrby(key: string, field: string, increment: number): Promise<number> {
    this.commands.push(['HINCRBY', key, field, increment]);
    const hash = this.hash(key);
    const current = Number.parseInt(hash.get(field) ?? '0', 10);
    if (Number.isNaN(current)) {
      throw new Error('ERR hash value is not an integer');
    }
    hash.set(field, String(current + increment));
    return current + increment;
  }

  async hset(key: string, field: string, value: string): Promise<number> {
    this.commands.push(['HSET', key, field, value]);
    const hash = this.hash(key);
    const added = hash.has(field) ? 0 : 1;
    hash.set(field, value);
    return added;
  }

  async hget(key: string, field: string): Promise<string | null> {
    this.commands.push(['HGET', key, field]);
    return this.hashes.get(key)?.get(field) ?? null;
  }

  async quit(): Promise<string> {
    this.quitCalled = true;
    return 'OK';
  }

  disconnect(): void {
    this.disconnectCalled = true;
  }

  private hash(key: string): Map<string, string> {
    let hash = this.hashes.get(key);
    if (!hash) {
      hash = new Map();
      this.hashes.set(key, hash);
    }
    return hash;
  }
}
