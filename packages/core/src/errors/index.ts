export {
  HttpCacheError,
  StorageError,
  SerializationError,
  PolicyError,
  errorMessage,
} from './http-cache-error.js';
