/**
 * Learning pipeline
 */

export * from './learning-pipeline.js';
