export * from './cloud.js';
export * from './request.js';
export * from './pep.js';
