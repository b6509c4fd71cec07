export * from './header-codec.js';
