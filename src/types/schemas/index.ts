/**
 * Zod schema exports for configuration and caller input validation
 */

export * from './common.js';
export * from './config.js';
export * from './model.js';
