export {
  HttpCache,
  type CacheRequestInit,
  type CachingFetch,
} from './http-cache.js';
