/**
 * Type exports
 */

export * from './outcome.js';
export * from './calibration.js';
export * from './bayesian.js';
export * from './report.js';
