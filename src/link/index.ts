export * from './attachment.js';
export * from './content.js';
export * from './resolved-link.js';
export * from './serialize.js';
