/**
 * Calibration Tracker Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CalibrationTracker } from '../../calibration/tracker.js';
import { CalibrationBucket } from '../../calibration/bucket.js';
import { OutcomeValidationError } from '../../errors.js';

const FIXED_TIME = '2024-03-01T12:00:00.000Z';

describe('CalibrationTracker', () => {
  let tracker: CalibrationTracker;

  beforeEach(() => {
    tracker = new CalibrationTracker({ clock: () => new Date(FIXED_TIME) });
  });

  describe('bucketIndex', () => {
    it('should map probabilities to equal-width buckets', () => {
      expect(tracker.bucketIndex(0)).toBe(0);
      expect(tracker.bucketIndex(0.05)).toBe(0);
      expect(tracker.bucketIndex(0.3)).toBe(3);
      expect(tracker.bucketIndex(0.85)).toBe(8);
      expect(tracker.bucketIndex(0.999)).toBe(9);
    });

    it('should place 1.0 in the last bucket', () => {
      expect(tracker.bucketIndex(1)).toBe(9);
    });

    it('should put everything in one bucket when n is 1', () => {
      const single = new CalibrationTracker({ nBuckets: 1 });

      expect(single.bucketIndex(0)).toBe(0);
      expect(single.bucketIndex(0.5)).toBe(0);
      expect(single.bucketIndex(1)).toBe(0);
    });

    it('should split an odd bucket count evenly', () => {
      const seven = new CalibrationTracker({ nBuckets: 7 });

      expect(seven.bucketIndex(0.1)).toBe(0);
      expect(seven.bucketIndex(0.15)).toBe(1);
      expect(seven.bucketIndex(0.5)).toBe(3);
      expect(seven.bucketIndex(0.99)).toBe(6);
      expect(seven.bucketIndex(1)).toBe(6);
    });

    it.each([1, 3, 7])('should place each probability inside its bucket range when n is %i', n => {
      const sized = new CalibrationTracker({ nBuckets: n });
      for (let k = 0; k <= 100; k++) {
        const p = k / 100;
        const index = sized.bucketIndex(p);
        const bucket = sized.getBucket(index);

        expect(index).toBeGreaterThanOrEqual(0);
        expect(index).toBeLessThan(n);
        expect(bucket?.probLow).toBeLessThanOrEqual(p);
        if (index < n - 1) {
          expect(bucket?.probHigh).toBeGreaterThan(p);
        }
      }
    });

    it('should stay in range for any probability', () => {
      for (let i = 0; i <= 100; i++) {
        const index = tracker.bucketIndex(i / 100);
        expect(index).toBeGreaterThanOrEqual(0);
        expect(index).toBeLessThan(10);
      }
    });
  });

  describe('addPredictionOutcome', () => {
    it('should count safe outcomes in the matching bucket', () => {
      tracker.addPredictionOutcome(0.85, 'safe');
      tracker.addPredictionOutcome(0.82, 'adverse');

      const bucket = tracker.getBucket(8);
      expect(bucket?.nPredictions).toBe(2);
      expect(bucket?.nSafeOutcomes).toBe(1);
      expect(tracker.totalPredictions).toBe(2);
      expect(tracker.totalSafeOutcomes).toBe(1);
    });

    it('should hand out copies of bucket counts', () => {
      tracker.addPredictionOutcome(0.85, 'safe');

      const bucket = tracker.getBucket(8);
      if (bucket) bucket.nPredictions = 50;

      expect(tracker.getBucket(8)?.nPredictions).toBe(1);
      expect(tracker.totalPredictions).toBe(1);
    });

    it('should ignore unknown outcomes', () => {
      tracker.addPredictionOutcome(0.85, 'unknown');

      expect(tracker.totalPredictions).toBe(0);
    });
  });

  describe('metrics', () => {
    it('should return zero ECE and MCE when empty', () => {
      expect(tracker.computeEce()).toBe(0);
      expect(tracker.computeMce()).toBe(0);
    });

    it('should report a single adverse outcome at 0.30', () => {
      tracker.addPredictionOutcome(0.3, 'adverse');

      const report = tracker.getCalibrationReport();

      expect(report.buckets).toEqual([
        {
          range: '30.0%-40.0%',
          nPredictions: 1,
          nSafeOutcomes: 0,
          observedSafeRate: 0,
          expectedSafeRate: 0.35,
          calibrationError: 0.35,
        },
      ]);
      expect(report.ece).toBe(0.35);
      expect(report.mce).toBe(0.35);
    });

    it('should measure the error of a small 40-50% bucket', () => {
      tracker.addPredictionOutcome(0.45, 'safe');
      tracker.addPredictionOutcome(0.42, 'safe');
      tracker.addPredictionOutcome(0.47, 'adverse');
      tracker.addPredictionOutcome(0.41, 'adverse');

      const report = tracker.getCalibrationReport();

      expect(report.buckets).toHaveLength(1);
      expect(report.buckets[0]?.range).toBe('40.0%-50.0%');
      expect(report.buckets[0]?.observedSafeRate).toBe(0.5);
      expect(report.buckets[0]?.calibrationError).toBe(0.05);
    });

    it('should report near-zero error for an exact 45% safe rate', () => {
      for (let i = 0; i < 1000; i++) {
        tracker.addPredictionOutcome(0.4 + (i % 10) / 100, i < 450 ? 'safe' : 'adverse');
      }

      const report = tracker.getCalibrationReport();

      expect(report.buckets).toHaveLength(1);
      expect(report.buckets[0]).toMatchObject({
        range: '40.0%-50.0%',
        nPredictions: 1000,
        nSafeOutcomes: 450,
        observedSafeRate: 0.45,
        calibrationError: 0,
      });
      expect(tracker.computeEce()).toBeCloseTo(0, 10);
    });

    it('should weight ECE by bucket size', () => {
      tracker.addPredictionOutcome(0.85, 'safe');
      tracker.addPredictionOutcome(0.25, 'adverse');

      expect(tracker.computeEce()).toBeCloseTo(0.2, 10);
      expect(tracker.computeMce()).toBeCloseTo(0.25, 10);
    });

    it('should keep ECE at or below MCE', () => {
      const pairs: Array<[number, 'safe' | 'adverse']> = [
        [0.95, 'safe'],
        [0.91, 'adverse'],
        [0.62, 'safe'],
        [0.15, 'adverse'],
        [0.33, 'safe'],
        [0.77, 'safe'],
      ];
      for (const [p, outcome] of pairs) {
        tracker.addPredictionOutcome(p, outcome);
        expect(tracker.computeEce()).toBeLessThanOrEqual(tracker.computeMce() + 1e-12);
      }
    });

    it('should compute the Brier score over the given pairs', () => {
      const brier = tracker.computeBrierScore([
        [0.8, 'safe'],
        [0.3, 'adverse'],
      ]);

      expect(brier).toBeCloseTo(0.065, 10);
    });

    it('should return a zero Brier score for no pairs', () => {
      expect(tracker.computeBrierScore([])).toBe(0);
    });
  });

  describe('getCalibrationReport', () => {
    it('should list only non-empty buckets and stamp the clock time', () => {
      tracker.addPredictionOutcome(0.85, 'safe');

      const report = tracker.getCalibrationReport();

      expect(report.totalPredictions).toBe(1);
      expect(report.totalSafeOutcomes).toBe(1);
      expect(report.timestamp).toBe(FIXED_TIME);
      expect(report.buckets.map(b => b.range)).toEqual(['80.0%-90.0%']);
    });
  });

  describe('snapshot', () => {
    it('should keep a bounded history', () => {
      const bounded = new CalibrationTracker({ historyLimit: 2 });
      bounded.snapshot();
      bounded.addPredictionOutcome(0.5, 'safe');
      bounded.snapshot();
      bounded.addPredictionOutcome(0.5, 'safe');
      bounded.snapshot();

      const history = bounded.getHistory();
      expect(history).toHaveLength(2);
      expect(history.map(h => h.totalPredictions)).toEqual([1, 2]);
    });
  });

  describe('reset', () => {
    it('should clear counts and history', () => {
      tracker.addPredictionOutcome(0.85, 'safe');
      tracker.snapshot();

      tracker.reset();

      expect(tracker.totalPredictions).toBe(0);
      expect(tracker.getHistory()).toHaveLength(0);
    });
  });

  describe('serialization', () => {
    it('should round trip counts and history', () => {
      tracker.addPredictionOutcome(0.85, 'safe');
      tracker.addPredictionOutcome(0.3, 'adverse');
      tracker.snapshot();

      const restored = CalibrationTracker.fromJSON(tracker.toJSON());

      expect(restored.nBuckets).toBe(10);
      expect(restored.totalPredictions).toBe(2);
      expect(restored.getBucket(8)?.nSafeOutcomes).toBe(1);
      expect(restored.getHistory()).toEqual(tracker.getHistory());
    });

    it('should reject state whose bucket count does not match', () => {
      const state = tracker.toJSON();
      expect(() => CalibrationTracker.fromJSON({ ...state, nBuckets: 5 })).toThrow(
        OutcomeValidationError
      );
    });
  });

  it('should reject a non-positive bucket count', () => {
    expect(() => new CalibrationTracker({ nBuckets: 0 })).toThrow(OutcomeValidationError);
  });
});

describe('CalibrationBucket', () => {
  it('should report zero observed rate when empty', () => {
    const bucket = new CalibrationBucket(0.2, 0.3);

    expect(bucket.isEmpty).toBe(true);
    expect(bucket.observedRate).toBe(0);
    expect(bucket.expectedRate).toBeCloseTo(0.25, 10);
  });

  it('should format its range as percentages', () => {
    expect(new CalibrationBucket(0, 0.1).label).toBe('0.0%-10.0%');
  });
});
