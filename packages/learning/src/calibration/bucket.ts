/**
 * Calibration Bucket
 *
 * Counts predictions falling in a half-open probability range and
 * how many of them turned out safe.
 *
 * @module calibration/bucket
 */

import type { CalibrationBucketState } from '../types/calibration.js';

export class CalibrationBucket {
  nPredictions = 0;
  nSafeOutcomes = 0;

  constructor(
    readonly probLow: number,
    readonly probHigh: number
  ) {}

  /**
   * Observed safety rate in this bucket (0 when empty)
   */
  get observedRate(): number {
    if (this.nPredictions === 0) return 0;
    return this.nSafeOutcomes / this.nPredictions;
  }

  /**
   * Expected rate at the bucket midpoint
   */
  get expectedRate(): number {
    return (this.probLow + this.probHigh) / 2;
  }

  get calibrationError(): number {
    return Math.abs(this.observedRate - this.expectedRate);
  }

  get isEmpty(): boolean {
    return this.nPredictions === 0;
  }

  /**
   * Range label such as "30.0%-40.0%"
   */
  get label(): string {
    return `${formatPercent(this.probLow)}-${formatPercent(this.probHigh)}`;
  }

  toJSON(): CalibrationBucketState {
    return {
      probLow: this.probLow,
      probHigh: this.probHigh,
      nPredictions: this.nPredictions,
      nSafeOutcomes: this.nSafeOutcomes,
    };
  }
}

function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}
