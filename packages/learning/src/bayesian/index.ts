/**
 * Bayesian prior updating
 */

export * from './beta.js';
export * from './updater.js';
