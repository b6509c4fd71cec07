export * from './target-dir.js';
export * from './enumerate.js';
