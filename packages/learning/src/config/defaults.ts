/**
 * Default configuration
 */

import type { LearningConfig } from './types.js';

/** Directory holding the database and config file */
export const OUTCOME_LOOP_DIR = '.outcome-loop';

export const DEFAULT_CONFIG: LearningConfig = {
  dbPath: `${OUTCOME_LOOP_DIR}/outcomes.db`,
  initialAlpha: 8.0,
  initialBeta: 2.0,
  calibrationBuckets: 10,
  learningRate: 0.1,
  historyLimit: 100,
  exportPath: 'outcomes_export.json',
  walMode: true,
  logLevel: 'info',
};
