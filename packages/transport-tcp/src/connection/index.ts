export * from './socket-connection.js';
