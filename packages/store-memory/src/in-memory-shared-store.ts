import type { SharedStore } from '@reddit-relay/core';

export interface InMemorySharedStoreOptions {
  /** How often expired keys are swept. `0` disables the sweep; expired keys are still dropped on read. */
  cleanupIntervalMs?: number;
}

interface StoredValue {
  value: string;
  /** Epoch milliseconds */
  expiresAt: number;
}

/**
 * Single-process `SharedStore`. Suitable for tests and for deployments that
 * run exactly one client process.
 */
export class InMemorySharedStore implements SharedStore {
  private readonly values = new Map<string, StoredValue>();
  private readonly maps = new Map<string, Map<string, string>>();
  private cleanupInterval?: NodeJS.Timeout;
  private isDestroyed = false;

  constructor({ cleanupIntervalMs = 60_000 }: InMemorySharedStoreOptions = {}) {
    if (cleanupIntervalMs > 0) {
      this.cleanupInterval = setInterval(() => {
        this.cleanup();
      }, cleanupIntervalMs);
      // Do not keep the process alive just for the sweep
      this.cleanupInterval.unref();
    }
  }

  async get(key: string): Promise<string | undefined> {
    this.assertUsable();

    const stored = this.values.get(key);
    if (!stored) {
      return undefined;
    }
    if (Date.now() >= stored.expiresAt) {
      this.values.delete(key);
      return undefined;
    }
    return stored.value;
  }

  async setWithTTL(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.assertUsable();
    this.values.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
  }

  async incrementField(mapKey: string, field: string, delta: number): Promise<number> {
    this.assertUsable();

    const map = this.map(mapKey);
    const current = Number.parseInt(map.get(field) ?? '0', 10);
    const next = (Number.isNaN(current) ? 0 : current) + delta;
    map.set(field, String(next));
    return next;
  }

  async setField(mapKey: string, field: string, value: string): Promise<void> {
    this.assertUsable();
    this.map(mapKey).set(field, value);
  }

  async getField(mapKey: string, field: string): Promise<string | undefined> {
    this.assertUsable();
    return this.maps.get(mapKey)?.get(field);
  }

  /** Drop every expired key. Returns how many were removed. */
  cleanup(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, stored] of this.values) {
      if (now >= stored.expiresAt) {
        this.values.delete(key);
        removed++;
      }
    }
    return removed;
  }

  getStats(): { keys: number; maps: number; fields: number } {
    let fields = 0;
    for (const map of this.maps.values()) {
      fields += map.size;
    }
    return { keys: this.values.size, maps: this.maps.size, fields };
  }

  async close(): Promise<void> {
    this.destroy();
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }
    this.values.clear();
    this.maps.clear();
    this.isDestroyed = true;
  }

  private map(mapKey: string): Map<string, string> {
    let map = this.maps.get(mapKey);
    if (!map) {
      map = new Map();
      this.maps.set(mapKey, map);
    }
    return map;
  }

  private assertUsable(): void {
    if (this.isDestroyed) {
      throw new Error('Shared store has been destroyed');
    }
  }
}
