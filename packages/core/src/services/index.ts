export * from './log-service.js';
export * from './registry.js';
export * from './tokens.js';
export * from './get-log.js';
export * from './utils.js';
