export * from './cache-manager.js';
export * from './memory-cache-manager.js';
export * from './indexed-memory-cache-manager.js';
export * from './sorted-index.js';
