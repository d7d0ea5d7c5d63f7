export { InMemorySharedStore } from './in-memory-shared-store.js';
export type { InMemorySharedStoreOptions } from './in-memory-shared-store.js';

// Re-export the store interface from the core package for convenience
export type { SharedStore } from '@reddit-relay/core';
