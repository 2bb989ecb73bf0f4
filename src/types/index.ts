/**
 * Public type exports
 */

export * from './capability.js';
export * from './models.js';
export type * from './service.js';
