export * from './types/index.js';
export * from './constants.js';
export * from './utils/env.js';
export * from './utils/errors.js';
export * from './utils/logger.js';
export * from './utils/retry.js';
export * from './utils/checkpoint.js';
export * from './utils/dead-letter.js';
export * from './resilience/rate-limiter.js';
export * from './resilience/circuit-breaker.js';
