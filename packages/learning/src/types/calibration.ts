/**
 * Calibration Types
 *
 * @module types/calibration
 */

/**
 * Per-bucket detail in a calibration report (non-empty buckets only)
 */
export interface CalibrationBucketDetail {
  /** Human readable range, e.g. "30.0%-40.0%" */
  range: string;
  nPredictions: number;
  nSafeOutcomes: number;
  observedSafeRate: number;
  expectedSafeRate: number;
  calibrationError: number;
}

/**
 * Calibration report over all tracked predictions
 */
export interface CalibrationReport {
  /** Expected Calibration Error */
  ece: number;
  /** Maximum Calibration Error */
  mce: number;
  totalPredictions: number;
  totalSafeOutcomes: number;
  buckets: CalibrationBucketDetail[];
  timestamp: string;
}

/**
 * Serialized bucket counts
 */
export interface CalibrationBucketState {
  probLow: number;
  probHigh: number;
  nPredictions: number;
  nSafeOutcomes: number;
}

/**
 * Serialized tracker state
 */
export interface CalibrationTrackerState {
  nBuckets: number;
  buckets: CalibrationBucketState[];
  history: CalibrationReport[];
}

/**
 * A persisted calibration snapshot
 */
export interface CalibrationSnapshot {
  snapshotAt: string;
  ece: number;
  mce: number;
  totalPredictions: number;
  totalSafeOutcomes: number;
  buckets: CalibrationBucketDetail[];
}
