import { integer, primaryKey, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const keyValueTable = sqliteTable('shared_kv', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
  /** Epoch milliseconds */
  expiresAt: integer('expires_at').notNull(),
});

export const mapFieldTable = sqliteTable(
  'shared_map_fields',
  {
    mapKey: text('map_key').notNull(),
    field: text('field').notNull(),
    value: text('value').notNull(),
  },
  (table) => [primaryKey({ columns: [table.mapKey, table.field] })],
);

/** DDL matching the tables above; run on every open. */
export const CREATE_TABLES_SQL = `
  CREATE TABLE IF NOT EXISTS shared_kv (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    expires_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_shared_kv_expires_at ON shared_kv (expires_at);
  CREATE TABLE IF NOT EXISTS shared_map_fields (
    map_key TEXT NOT NULL,
    field TEXT NOT NULL,
    value TEXT NOT NULL,
    PRIMARY KEY (map_key, field)
  );
`;
