export * from './chunk-controller.js';
