/**
 * Configuration
 */

export * from './types.js';
export * from './defaults.js';
export * from './schema.js';
export * from './loader.js';
