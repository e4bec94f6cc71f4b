export * from './config.js';
export * from './policies.js';
export * from './link/index.js';
export * from './storage/index.js';
export * from './util/index.js';
