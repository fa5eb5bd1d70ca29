export * from './gracefulShutdown.js';
