/**
 * Calibration tracking
 */

export * from './bucket.js';
export * from './tracker.js';
