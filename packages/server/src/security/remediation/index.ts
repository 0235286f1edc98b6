export * from './adapters.js';
export * from './registry.js';
export * from './dispatcher.js';
