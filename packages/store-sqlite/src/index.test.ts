import { describe, it, expect } from 'vitest';
import * as sqlite from './index.js';

describe('store-sqlite index exports', () => {
  it('re-exports the sqlite store and schema', () => {
    expect(sqlite.SQLiteSharedStore).toBeTypeOf('function');
    expect(sqlite.keyValueTable).toBeDefined();
    expect(sqlite.mapFieldTable).toBeDefined();
    expect(sqlite.CREATE_TABLES_SQL).toContain('CREATE TABLE IF NOT EXISTS shared_kv');
  });
});
