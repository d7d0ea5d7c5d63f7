export { DynamoDBSharedStore } from './dynamodb-shared-store.js';
export type { DynamoDBSharedStoreOptions } from './dynamodb-shared-store.js';
export {
  DEFAULT_TABLE_NAME,
  TABLE_SCHEMA,
  TTL_ATTRIBUTE,
  createTable,
  ensureTable,
} from './table.js';
export type { TableProvisioningOptions } from './table.js';

// Re-export the store interface from the core package for convenience
export type { SharedStore } from '@reddit-relay/core';
