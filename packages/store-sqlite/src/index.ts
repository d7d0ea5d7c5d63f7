export { SQLiteSharedStore } from './sqlite-shared-store.js';
export type { SQLiteSharedStoreOptions } from './sqlite-shared-store.js';
export * from './schema.js';

// Re-export the store interface from the core package for convenience
export type { SharedStore } from '@reddit-relay/core';
