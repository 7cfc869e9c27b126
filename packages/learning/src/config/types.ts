/**
 * Configuration types
 */

import type { LogLevel } from '../utils/logger.js';

export interface LearningConfig {
  /** SQLite database path, or ":memory:" */
  dbPath: string;
  /** Initial Beta prior alpha */
  initialAlpha: number;
  /** Initial Beta prior beta */
  initialBeta: number;
  /** Number of calibration buckets over [0, 1] */
  calibrationBuckets: number;
  /** Pseudo-count added per known outcome */
  learningRate: number;
  /** In-memory history kept by the tracker and updater */
  historyLimit: number;
  /** Default target for outcome exports */
  exportPath: string;
  /** Enable SQLite WAL mode */
  walMode: boolean;
  logLevel: LogLevel;
}
