export * from './link-store.js';
export * from './memory-store.js';
export * from './file-store.js';
