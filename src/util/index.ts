export * from './issues.js';
export * from './keys.js';
export * from './log.js';
export * from './urls/index.js';
export * from './cheerio/meta-tags.js';
