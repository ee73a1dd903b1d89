export * from './types.js';
export * from './severity.js';
export * from './keyed-mutex.js';
export * from './notification-templates.js';
