import Database from 'better-sqlite3';
import type { SharedStore } from '@reddit-relay/core';
import { and, eq, lte, sql } from 'drizzle-orm';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { CREATE_TABLES_SQL, keyValueTable, mapFieldTable } from './schema.js';

export interface SQLiteSharedStoreOptions {
  /** File path or an open connection. Defaults to `':memory:'`. */
  database?: string | Database.Database;
  /** How often expired keys are deleted. `0` disables the sweep. */
  cleanupIntervalMs?: number;
}

/**
 * `SharedStore` on a SQLite file. Every process that opens the same file
 * shares the rate-limit state.
 *
 * A connection passed in as `database` is left open by `close()`.
 */
export class SQLiteSharedStore implements SharedStore {
  private readonly sqlite: Database.Database;
  private readonly db: BetterSQLite3Database;
  private readonly isConnectionManaged: boolean;
  private cleanupInterval?: NodeJS.Timeout;
  private isDestroyed = false;

  constructor({
    database = ':memory:',
    cleanupIntervalMs = 60_000,
  }: SQLiteSharedStoreOptions = {}) {
    if (typeof database === 'string') {
      this.sqlite = new Database(database);
      this.sqlite.pragma('journal_mode = WAL');
      this.isConnectionManaged = true;
    } else {
      this.sqlite = database;
      this.isConnectionManaged = false;
    }
    this.sqlite.exec(CREATE_TABLES_SQL);
    this.db = drizzle(this.sqlite);

    if (cleanupIntervalMs > 0) {
      this.cleanupInterval = setInterval(() => {
        this.cleanup();
      }, cleanupIntervalMs);
      this.cleanupInterval.unref();
    }
  }

  async get(key: string): Promise<string | undefined> {
    this.assertUsable();

    const row = this.db
      .select({ value: keyValueTable.value, expiresAt: keyValueTable.expiresAt })
      .from(keyValueTable)
      .where(eq(keyValueTable.key, key))
      .get();

    if (!row || Date.now() >= row.expiresAt) {
      return undefined;
    }
    return row.value;
  }

  async setWithTTL(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.assertUsable();

    const expiresAt = Date.now() + ttlSeconds * 1000;
    this.db
      .insert(keyValueTable)
      .values({ key, value, expiresAt })
      .onConflictDoUpdate({ target: keyValueTable.key, set: { value, expiresAt } })
      .run();
  }

  async incrementField(mapKey: string, field: string, delta: number): Promise<number> {
    this.assertUsable();

    const row = this.db
      .insert(mapFieldTable)
      .values({ mapKey, field, value: String(delta) })
      .onConflictDoUpdate({
        target: [mapFieldTable.mapKey, mapFieldTable.field],
        set: {
          value: sql`CAST(CAST(${mapFieldTable.value} AS INTEGER) + CAST(${delta} AS INTEGER) AS TEXT)`,
        },
      })
      .returning({ value: mapFieldTable.value })
      .get();

    if (!row) {
      throw new Error(`Increment of ${mapKey}.${field} returned no row`);
    }
    return Number.parseInt(row.value, 10);
  }

  async setField(mapKey: string, field: string, value: string): Promise<void> {
    this.assertUsable();

    this.db
      .insert(mapFieldTable)
      .values({ mapKey, field, value })
      .onConflictDoUpdate({ target: [mapFieldTable.mapKey, mapFieldTable.field], set: { value } })
      .run();
  }

  async getField(mapKey: string, field: string): Promise<string | undefined> {
    this.assertUsable();

    const row = this.db
      .select({ value: mapFieldTable.value })
      .from(mapFieldTable)
      .where(and(eq(mapFieldTable.mapKey, mapKey), eq(mapFieldTable.field, field)))
      .get();
    return row?.value;
  }

  /** Delete every expired key. Returns how many rows were removed. */
  cleanup(): number {
    if (this.isDestroyed) {
      return 0;
    }
    const result = this.db
      .delete(keyValueTable)
      .where(lte(keyValueTable.expiresAt, Date.now()))
      .run();
    return result.changes;
  }

  async close(): Promise<void> {
    this.shutdown();
  }

  destroy(): void {
    this.shutdown();
  }

  private shutdown(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }
    if (this.isDestroyed) {
      return;
    }
    this.isDestroyed = true;
    if (this.isConnectionManaged) {
      this.sqlite.close();
    }
  }

  private assertUsable(): void {
    if (this.isDestroyed) {
      throw new Error('Shared store has been destroyed');
    }
  }
}
