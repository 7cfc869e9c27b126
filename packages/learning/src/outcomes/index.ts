/**
 * Outcome capture
 */

export * from './outcome-type.js';
export * from './outcome-record.js';
export * from './schema.js';
