export * from './sync.js';
export * from './errors.js';
export * from './stores.js';
export * from './transport.js';
