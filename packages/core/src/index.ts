export * from './cache/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './http-cache/index.js';
export * from './stores/index.js';
export * from './types/index.js';
export { createLogger, type Logger } from './logger.js';
