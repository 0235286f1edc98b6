export * from './types/access.js';
export * from './types/events.js';
export * from './types/api.js';
