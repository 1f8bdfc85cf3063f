export { DynamoDBCacheManager } from './dynamodb-cache-manager.js';

export type { DynamoDBCacheManagerOptions } from './dynamodb-cache-manager.js';

export {
  CACHE_PREFIX,
  DEFAULT_TABLE_NAME,
  TABLE_SCHEMA,
  TAG_PREFIX,
} from './table.js';

export type {
  CacheManager,
  CachedResponse,
  IndexedCacheManager,
  RangeField,
  StoredEntry,
} from '@http-cache-kit/core';
