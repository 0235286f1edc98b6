export * from './types.js';
export * from './metrics.js';
export * from './storage.js';
export * from './monitor.js';
