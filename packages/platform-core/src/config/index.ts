export * from './health-config.js';
