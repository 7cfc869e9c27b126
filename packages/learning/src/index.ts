/**
 * @outcome-loop/learning
 *
 * Outcome capture, calibration tracking and Bayesian prior updating for
 * clinical risk predictions.
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors.js';

// Outcomes
export * from './outcomes/index.js';

// Calibration
export * from './calibration/index.js';

// Bayesian priors
export * from './bayesian/index.js';

// Storage
export * from './storage/index.js';

// Configuration
export * from './config/index.js';

// Pipeline
export * from './pipeline/index.js';

// Utilities
export * from './utils/index.js';
