export * from './wire.js';
export * from './transport.js';
export * from './transfer.js';
