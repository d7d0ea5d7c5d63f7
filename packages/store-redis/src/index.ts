export { RedisSharedStore } from './redis-shared-store.js';
export type { RedisSharedStoreOptions } from './redis-shared-store.js';
export {
  DEFAULT_REDIS_CONNECTION,
  createIoredisClient,
  fromIoredis,
} from './redis-commands.js';
export type { RedisCommands, RedisConnectionOptions } from './redis-commands.js';

// Re-export the store interface from the core package for convenience
export type { SharedStore } from '@reddit-relay/core';
