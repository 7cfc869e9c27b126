/**
 * Storage Layer
 */

export * from './interface.js';
export * from './factory.js';
export * from './sqlite/index.js';
