export * from './defaults.js';
export * from './settings.js';
