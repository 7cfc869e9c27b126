export * from './hash.js';
export * from './time.js';
export * from './math.js';
export * from './logger.js';
