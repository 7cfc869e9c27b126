/**
 * Calibration Tracker
 *
 * Partitions [0, 1] into equal-width buckets and accumulates
 * prediction/outcome pairs. Key metrics:
 * - ECE (Expected Calibration Error): count-weighted average bucket error
 * - MCE (Maximum Calibration Error): worst bucket error
 * - Brier score: mean squared error against the 0/1 safe indicator
 *
 * @module calibration/tracker
 */

import { OutcomeValidationError } from '../errors.js';
import { safeIndicator } from '../outcomes/outcome-type.js';
import type {
  CalibrationBucketDetail,
  CalibrationBucketState,
  CalibrationReport,
  CalibrationTrackerState,
} from '../types/calibration.js';
import type { OutcomeType } from '../types/outcome.js';
import { roundTo } from '../utils/math.js';
import { now, systemClock, type Clock } from '../utils/time.js';
import { CalibrationBucket } from './bucket.js';

export interface CalibrationTrackerOptions {
  /** Number of buckets (default: 10) */
  nBuckets?: number;
  /** Snapshots kept in memory and in serialized state (default: 100) */
  historyLimit?: number;
  clock?: Clock;
}

/**
 * A (predicted probability, outcome) pair
 */
export type PredictionOutcomePair = readonly [predictedProb: number, outcome: OutcomeType];

export class CalibrationTracker {
  readonly nBuckets: number;
  private readonly historyLimit: number;
  private readonly clock: Clock;
  private buckets: CalibrationBucket[];
  private history: CalibrationReport[] = [];

  constructor(options: CalibrationTrackerOptions = {}) {
    const nBuckets = options.nBuckets ?? 10;
    if (!Number.isInteger(nBuckets) || nBuckets < 1) {
      throw new OutcomeValidationError(`Bucket count must be a positive integer, got ${nBuckets}`);
    }
    this.nBuckets = nBuckets;
    this.historyLimit = options.historyLimit ?? 100;
    this.clock = options.clock ?? systemClock;
    this.buckets = this.initBuckets();
  }

  private initBuckets(): CalibrationBucket[] {
    const step = 1 / this.nBuckets;
    const buckets: CalibrationBucket[] = [];
    for (let i = 0; i < this.nBuckets; i++) {
      buckets.push(new CalibrationBucket(i * step, (i + 1) * step));
    }
    return buckets;
  }

  /**
   * Bucket for a probability. 1.0 lands in the last bucket.
   */
  bucketIndex(predictedProb: number): number {
    const index = Math.floor(predictedProb * this.nBuckets);
    return Math.max(0, Math.min(index, this.nBuckets - 1));
  }

  /**
   * Copy of one bucket's counts
   */
  getBucket(index: number): CalibrationBucketState | undefined {
    return this.buckets[index]?.toJSON();
  }

  /**
   * Add a prediction-outcome pair. Unknown outcomes are ignored.
   */
  addPredictionOutcome(predictedProbSafe: number, actualOutcome: OutcomeType): void {
    if (actualOutcome === 'unknown') return;

    const bucket = this.buckets[this.bucketIndex(predictedProbSafe)];
    if (!bucket) return;

    bucket.nPredictions++;
    if (actualOutcome === 'safe') {
      bucket.nSafeOutcomes++;
    }
  }

  get totalPredictions(): number {
    return this.buckets.reduce((sum, b) => sum + b.nPredictions, 0);
  }

  get totalSafeOutcomes(): number {
    return this.buckets.reduce((sum, b) => sum + b.nSafeOutcomes, 0);
  }

  /**
   * ECE = Σ (n_i / N) * |acc_i - conf_i|
   */
  computeEce(): number {
    const total = this.totalPredictions;
    if (total === 0) return 0;

    let ece = 0;
    for (const bucket of this.buckets) {
      if (bucket.isEmpty) continue;
      ece += (bucket.nPredictions / total) * bucket.calibrationError;
    }
    return ece;
  }

  /**
   * MCE = max_i |acc_i - conf_i|
   */
  computeMce(): number {
    let mce = 0;
    for (const bucket of this.buckets) {
      if (!bucket.isEmpty) {
        mce = Math.max(mce, bucket.calibrationError);
      }
    }
    return mce;
  }

  /**
   * Brier = (1/N) Σ (p_i - o_i)². Independent of the buckets.
   */
  computeBrierScore(outcomes: readonly PredictionOutcomePair[]): number {
    if (outcomes.length === 0) return 0;

    let total = 0;
    for (const [predictedProb, outcome] of outcomes) {
      total += (predictedProb - safeIndicator(outcome)) ** 2;
    }
    return total / outcomes.length;
  }

  getCalibrationReport(): CalibrationReport {
    const buckets: CalibrationBucketDetail[] = this.buckets
      .filter(b => !b.isEmpty)
      .map(b => ({
        range: b.label,
        nPredictions: b.nPredictions,
        nSafeOutcomes: b.nSafeOutcomes,
        observedSafeRate: roundTo(b.observedRate, 4),
        expectedSafeRate: roundTo(b.expectedRate, 4),
        calibrationError: roundTo(b.calibrationError, 4),
      }));

    return {
      ece: roundTo(this.computeEce(), 4),
      mce: roundTo(this.computeMce(), 4),
      totalPredictions: this.totalPredictions,
      totalSafeOutcomes: this.totalSafeOutcomes,
      buckets,
      timestamp: now(this.clock),
    };
  }

  /**
   * Compute the current report and append it to history
   */
  snapshot(): CalibrationReport {
    const report = this.getCalibrationReport();
    this.history.push(report);
    if (this.history.length > this.historyLimit) {
      this.history = this.history.slice(-this.historyLimit);
    }
    return report;
  }

  getHistory(): readonly CalibrationReport[] {
    return this.history;
  }

  reset(): void {
    this.buckets = this.initBuckets();
    this.history = [];
  }

  toJSON(): CalibrationTrackerState {
    return {
      nBuckets: this.nBuckets,
      buckets: this.buckets.map(b => b.toJSON()),
      history: this.history.slice(-this.historyLimit),
    };
  }

  static fromJSON(
    state: CalibrationTrackerState,
    options: Omit<CalibrationTrackerOptions, 'nBuckets'> = {}
  ): CalibrationTracker {
    if (state.buckets.length !== state.nBuckets) {
      throw new OutcomeValidationError(
        `Tracker state has ${state.buckets.length} buckets, expected ${state.nBuckets}`
      );
    }

    const tracker = new CalibrationTracker({ ...options, nBuckets: state.nBuckets });
    state.buckets.forEach((saved, i) => {
      const bucket = tracker.buckets[i];
      if (bucket) {
        bucket.nPredictions = saved.nPredictions;
        bucket.nSafeOutcomes = saved.nSafeOutcomes;
      }
    });
    tracker.history = state.history.slice(-tracker.historyLimit);
    return tracker;
  }
}
