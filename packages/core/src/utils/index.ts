export * from './id.js';
export * from './format.js';
export * from './logger.js';
