/**
 * SQLite Storage Implementation
 */

export * from './client.js';
export * from './schema.js';
export * from './queries.js';
export * from './store.js';
