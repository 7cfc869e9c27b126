/**
 * Learning Pipeline Tests
 *
 * End-to-end tests over an in-memory store, plus restart and
 * concurrent-writer tests over a temporary database file.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { LearningPipeline, createLearningPipeline } from '../../pipeline/learning-pipeline.js';
import { SQLiteOutcomeStore } from '../../storage/sqlite/store.js';
import {
  DuplicateOutcomeError,
  OutcomeValidationError,
  StaleLearningStateError,
} from '../../errors.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { Clock } from '../../utils/time.js';
import type { OutcomeExport, RecordOutcomeInput } from '../../types/index.js';

describe('LearningPipeline', () => {
  let store: SQLiteOutcomeStore;
  let logger: Logger;
  let pipeline: LearningPipeline;

  beforeEach(() => {
    store = new SQLiteOutcomeStore(':memory:', { walMode: false });
    logger = createMockLogger();
    pipeline = new LearningPipeline(store, {}, { logger, clock: createStepClock() });
  });

  afterEach(() => {
    pipeline.close();
  });

  describe('construction', () => {
    it('should start operational with the default prior', () => {
      expect(pipeline.state).toBe('operational');
      expect(pipeline.getCurrentPriors()).toMatchObject({ alpha: 8, beta: 2, nUpdates: 0 });
      expect(pipeline.getCalibrationReport().totalPredictions).toBe(0);
    });

    it('should reject an invalid configuration', () => {
      const other = new SQLiteOutcomeStore(':memory:', { walMode: false });
      expect(() => new LearningPipeline(other, { learningRate: -1 }, { logger })).toThrow(
        OutcomeValidationError
      );
      other.close();
    });
  });

  describe('recordOutcome', () => {
    it('should update the prior and calibration for a safe outcome', () => {
      const record = pipeline.recordOutcome(createInput());

      expect(record.outcomeHash).toMatch(/^[0-9a-f]{64}$/);
      expect(pipeline.getCurrentPriors()).toMatchObject({
        alpha: 8.1,
        beta: 2,
        priorMean: 0.802,
        nUpdates: 1,
      });

      const calibration = pipeline.getCalibrationReport();
      expect(calibration.buckets).toHaveLength(1);
      expect(calibration.buckets[0]).toMatchObject({
        range: '80.0%-90.0%',
        nPredictions: 1,
        nSafeOutcomes: 1,
      });
    });

    it('should persist the prior update and learning state', () => {
      const record = pipeline.recordOutcome(createInput());

      expect(store.readLearningState()).toMatchObject({ alpha: 8.1, beta: 2, nUpdates: 1, version: 1 });
      const [event] = store.listPriorUpdates(10);
      expect(event).toMatchObject({ outcomeHash: record.outcomeHash, oldAlpha: 8, newAlpha: 8.1 });
    });

    it('should store unknown outcomes without learning from them', () => {
      pipeline.recordOutcome(createInput({ actualOutcome: 'unknown' }));

      expect(pipeline.getCurrentPriors()).toMatchObject({ alpha: 8, beta: 2, nUpdates: 0 });
      expect(pipeline.getCalibrationReport().totalPredictions).toBe(0);
      expect(store.listOutcomes()).toHaveLength(1);
      expect(store.readLearningState()).toBeNull();
    });

    it('should reject a duplicate without changing any state', () => {
      pipeline.recordOutcome(createInput({ recordedAt: '2024-03-01T10:00:00.000Z' }));

      expect(() =>
        pipeline.recordOutcome(createInput({ recordedAt: '2024-03-01T10:00:00.000Z' }))
      ).toThrow(DuplicateOutcomeError);

      expect(pipeline.getCurrentPriors()).toMatchObject({ alpha: 8.1, nUpdates: 1 });
      expect(pipeline.getCalibrationReport().totalPredictions).toBe(1);
      expect(pipeline.getPriorHistory()).toHaveLength(1);
    });

    it('should accept the same decision at a different time', () => {
      pipeline.recordOutcome(createInput({ recordedAt: '2024-03-01T10:00:00.000Z' }));
      pipeline.recordOutcome(createInput({ recordedAt: '2024-03-01T11:00:00.000Z' }));

      expect(pipeline.getCurrentPriors().alpha).toBeCloseTo(8.2, 10);
    });

    it('should accept the same decision less than a millisecond apart', () => {
      pipeline.recordOutcome(createInput({ recordedAt: '2024-03-01T10:00:00.000100Z' }));
      pipeline.recordOutcome(createInput({ recordedAt: '2024-03-01T10:00:00.000200Z' }));

      expect(store.listOutcomes().map(o => o.recordedAt).sort()).toEqual([
        '2024-03-01T10:00:00.000100Z',
        '2024-03-01T10:00:00.000200Z',
      ]);
      expect(pipeline.getCurrentPriors().alpha).toBeCloseTo(8.2, 10);
    });

    it('should treat equal instants written differently as duplicates', () => {
      pipeline.recordOutcome(createInput({ recordedAt: '2024-03-01T10:00:00Z' }));

      expect(() =>
        pipeline.recordOutcome(createInput({ recordedAt: '2024-03-01T10:00:00.000Z' }))
      ).toThrow(DuplicateOutcomeError);
    });

    it('should raise validation errors before touching storage', () => {
      expect(() => pipeline.recordOutcome(createInput({ outcomeSeverity: 0 }))).toThrow(
        OutcomeValidationError
      );
      expect(store.listOutcomes()).toHaveLength(0);
    });
  });

  describe('comparePredictionOutcome', () => {
    it('should score the latest outcome against its prediction', () => {
      pipeline.recordOutcome(createInput());

      expect(pipeline.comparePredictionOutcome('abc123')).toMatchObject({
        decisionHash: 'abc123',
        predictedProbSafe: 0.85,
        actualOutcome: 'safe',
        outcomeSeverity: 1,
        predictionError: 0.15,
        predictionCorrect: true,
        brierScore: 0.0225,
      });
    });

    it('should flag a confident prediction that went wrong', () => {
      pipeline.recordOutcome(createInput({ decisionHash: 'def456', predictedProbSafe: 0.9, actualOutcome: 'adverse' }));

      expect(pipeline.comparePredictionOutcome('def456')).toMatchObject({
        predictionError: 0.9,
        predictionCorrect: false,
        brierScore: 0.81,
      });
    });

    it('should return null for an unknown decision', () => {
      expect(pipeline.comparePredictionOutcome('nope')).toBeNull();
    });
  });

  describe('getPosteriorProbability', () => {
    it('should not change the stored prior', () => {
      const posterior = pipeline.getPosteriorProbability(2, 0);

      expect(posterior.probSafe).toBe(0.8333);
      expect(pipeline.getCurrentPriors().alpha).toBe(8);
    });
  });

  describe('generateLearningReport', () => {
    beforeEach(() => {
      pipeline.recordOutcome(createInput({ decisionHash: 'a' }));
      pipeline.recordOutcome(
        createInput({
          decisionHash: 'b',
          predictedProbSafe: 0.3,
          predictedRiskCategory: 'high',
          actualOutcome: 'adverse',
          outcomeSeverity: 4,
        })
      );
      pipeline.recordOutcome(
        createInput({
          decisionHash: 'c',
          predictedProbSafe: 0.6,
          predictedRiskCategory: 'moderate',
          actualOutcome: 'adverse',
          outcomeSeverity: 2,
        })
      );
      pipeline.recordOutcome(
        createInput({
          decisionHash: 'd',
          predictedProbSafe: 0.7,
          predictedRiskCategory: 'moderate',
          actualOutcome: 'unknown',
        })
      );
    });

    it('should summarize outcomes and model performance', () => {
      const report = pipeline.generateLearningReport('summary');

      expect(report.reportType).toBe('summary');
      expect(report.totalOutcomes).toBe(4);
      expect(report.evaluatedOutcomes).toBe(3);
      expect(report.outcomeDistribution).toEqual({ safe: 1, adverse: 2, unknown: 1 });
      expect(report.modelPerformance.nCorrect).toBe(2);
      expect(report.modelPerformance.nEvaluated).toBe(3);
      expect(report.modelPerformance.accuracy).toBe(0.6667);
      expect(report.modelPerformance.brierScore).toBeCloseTo(0.1575, 4);
      expect(report.severityAnalysis).toEqual({
        avgAdverseSeverity: 3,
        minAdverseSeverity: 2,
        maxAdverseSeverity: 4,
      });
      expect(report.dailyStats).toBeUndefined();
      expect(report.riskCategoryPerformance).toBeUndefined();
    });

    it('should add daily and risk category breakdowns to a comprehensive report', () => {
      const report = pipeline.generateLearningReport();

      expect(report.dailyStats).toEqual([
        { date: '2024-03-01', count: 4, safeCount: 1, adverseCount: 2, avgPrediction: 0.6125 },
      ]);
      expect(report.riskCategoryPerformance).toEqual([
        {
          category: 'high',
          count: 1,
          safeCount: 0,
          adverseCount: 1,
          unknownCount: 0,
          observedSafeRate: 0,
          accuracy: 1,
        },
        {
          category: 'low',
          count: 1,
          safeCount: 1,
          adverseCount: 0,
          unknownCount: 0,
          observedSafeRate: 1,
          accuracy: 1,
        },
        {
          category: 'moderate',
          count: 2,
          safeCount: 0,
          adverseCount: 1,
          unknownCount: 1,
          observedSafeRate: 0,
          accuracy: 0,
        },
      ]);
    });

    it('should persist every report', () => {
      pipeline.generateLearningReport('calibration');
      pipeline.generateLearningReport('outcomes');

      const reports = store.listReports(10);
      expect(reports.map(r => r.reportType)).toEqual(['outcomes', 'calibration']);
      expect(JSON.parse(reports[0]?.reportData ?? '{}')).toMatchObject({ totalOutcomes: 4 });
    });
  });

  describe('getPatientOutcomes', () => {
    it('should list a patient history newest first', () => {
      pipeline.recordOutcome(createInput({ decisionHash: 'first' }));
      pipeline.recordOutcome(createInput({ decisionHash: 'second', actualOutcome: 'adverse' }));
      pipeline.recordOutcome(createInput({ decisionHash: 'other', mrn: 'MRN002' }));

      const history = pipeline.getPatientOutcomes('MRN001');

      expect(history.map(o => o.decisionHash)).toEqual(['second', 'first']);
      expect(history[0]).toMatchObject({ actualOutcome: 'adverse', recordedBy: 'dr_test' });
      expect(pipeline.getPatientOutcomes('MRN001', 1)).toHaveLength(1);
    });
  });

  describe('calibration snapshots', () => {
    it('should persist snapshots and list them newest first', () => {
      pipeline.recordOutcome(createInput());
      pipeline.takeCalibrationSnapshot();
      pipeline.recordOutcome(createInput({ decisionHash: 'def456', predictedProbSafe: 0.3, actualOutcome: 'adverse' }));
      const latest = pipeline.takeCalibrationSnapshot();

      const history = pipeline.getCalibrationHistory();

      expect(history.map(s => s.totalPredictions)).toEqual([2, 1]);
      expect(history[0]?.snapshotAt).toBe(latest.timestamp);
      expect(history[0]?.buckets).toEqual(latest.buckets);
    });
  });

  describe('getPriorHistory', () => {
    it('should list updates newest first with derived means', () => {
      pipeline.recordOutcome(createInput({ decisionHash: 'first' }));
      const second = pipeline.recordOutcome(createInput({ decisionHash: 'second' }));

      const history = pipeline.getPriorHistory();

      expect(history).toHaveLength(2);
      expect(history[0]).toMatchObject({
        outcomeHash: second.outcomeHash,
        oldAlpha: 8.1,
        oldBeta: 2,
        oldMean: 0.802,
        newMean: 0.8039,
        learningRate: 0.1,
      });
      expect(history[0]?.newAlpha).toBeCloseTo(8.2, 10);
      expect(pipeline.getPriorHistory(1)).toHaveLength(1);
    });
  });

  describe('verifyOutcomeIntegrity', () => {
    it('should pass for untouched outcomes', () => {
      pipeline.recordOutcome(createInput({ decisionHash: 'first' }));
      pipeline.recordOutcome(createInput({ decisionHash: 'second' }));

      expect(pipeline.verifyOutcomeIntegrity()).toMatchObject({
        valid: true,
        totalOutcomes: 2,
        validOutcomes: 2,
        invalidIds: [],
      });
    });

    it('should detect an outcome edited out-of-band', () => {
      pipeline.recordOutcome(createInput({ decisionHash: 'first' }));
      pipeline.recordOutcome(createInput({ decisionHash: 'second' }));
      store.client.exec(`UPDATE outcomes SET actual_outcome = 'adverse' WHERE id = 1`);

      const result = pipeline.verifyOutcomeIntegrity();

      expect(result).toMatchObject({ valid: false, totalOutcomes: 2, validOutcomes: 1, invalidIds: [1] });
      expect(logger.warn).toHaveBeenCalledWith('Integrity check failed for outcome ids: 1');
    });

    it('should report an empty store as valid', () => {
      expect(pipeline.verifyOutcomeIntegrity()).toMatchObject({ valid: true, totalOutcomes: 0 });
    });
  });

  describe('reload', () => {
    it('should coerce malformed stored outcomes to unknown', () => {
      pipeline.recordOutcome(createInput());
      store.client.exec(`UPDATE outcomes SET actual_outcome = 'exploded' WHERE id = 1`);

      pipeline.reload();

      expect(pipeline.state).toBe('operational');
      expect(pipeline.getCalibrationReport().totalPredictions).toBe(0);
      expect(pipeline.getCurrentPriors().alpha).toBe(8.1);
      expect(logger.warn).toHaveBeenCalledWith('Unrecognized stored outcome "exploded", treating as unknown');
      expect(pipeline.comparePredictionOutcome('abc123')?.actualOutcome).toBe('unknown');
      expect(pipeline.generateLearningReport('summary').outcomeDistribution).toEqual({
        safe: 0,
        adverse: 0,
        unknown: 1,
      });
    });
  });
});

describe('LearningPipeline with a database file', () => {
  let tempDir: string;
  let dbPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'outcome-loop-'));
    dbPath = path.join(tempDir, 'nested', 'outcomes.db');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should restore priors and calibration after a restart', () => {
    const first = createLearningPipeline({ dbPath }, { logger: silentLogger });
    first.recordOutcome(createInput({ decisionHash: 'a' }));
    first.recordOutcome(createInput({ decisionHash: 'b', predictedProbSafe: 0.3, actualOutcome: 'adverse' }));
    first.recordOutcome(createInput({ decisionHash: 'c', actualOutcome: 'unknown' }));
    const before = first.getCalibrationReport();
    first.close();

    const second = createLearningPipeline({ dbPath }, { logger: silentLogger });

    expect(second.getCurrentPriors()).toMatchObject({ alpha: 8.1, beta: 2.1, nUpdates: 2 });
    expect(second.getCalibrationReport().buckets).toEqual(before.buckets);
    second.close();
  });

  it('should fail loudly when another writer moved the learning state', () => {
    const logger = createMockLogger();
    const writerA = createLearningPipeline({ dbPath }, { logger });
    const writerB = createLearningPipeline({ dbPath }, { logger });

    writerA.recordOutcome(createInput({ decisionHash: 'from-a' }));

    expect(() => writerB.recordOutcome(createInput({ decisionHash: 'from-b' }))).toThrow(
      StaleLearningStateError
    );
    expect(writerB.getCurrentPriors()).toMatchObject({ alpha: 8, nUpdates: 0 });
    expect(writerB.comparePredictionOutcome('from-b')).toBeNull();

    writerB.reload();
    writerB.recordOutcome(createInput({ decisionHash: 'from-b' }));

    expect(writerB.getCurrentPriors().alpha).toBeCloseTo(8.2, 10);
    expect(writerB.getCurrentPriors().nUpdates).toBe(2);

    writerA.close();
    writerB.close();
  });

  it('should export outcomes oldest first as JSON', () => {
    const exportPath = path.join(tempDir, 'export.json');
    const pipeline = createLearningPipeline({ dbPath, exportPath }, { logger: silentLogger });
    pipeline.recordOutcome(createInput({ decisionHash: 'later', recordedAt: '2024-03-02T10:00:00.000Z' }));
    pipeline.recordOutcome(
      createInput({ decisionHash: 'earlier', recordedAt: '2024-03-01T10:00:00.000Z', metadata: { ward: '4B' } })
    );

    const result = pipeline.exportOutcomes();
    const written: OutcomeExport = JSON.parse(fs.readFileSync(exportPath, 'utf-8'));

    expect(result.totalOutcomes).toBe(2);
    expect(written.outcomes.map(o => o.decisionHash)).toEqual(['earlier', 'later']);
    expect(written.outcomes[0]?.metadata).toEqual({ ward: '4B' });
    expect(written.currentPriors.alpha).toBeCloseTo(8.2, 10);
    expect(written).toEqual(result);
    pipeline.close();
  });
});

function createMockLogger(): Logger {
  return {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  };
}

/**
 * Clock that advances one second per call
 */
function createStepClock(start = '2024-03-01T10:00:00.000Z'): Clock {
  let current = Date.parse(start);
  return () => {
    current += 1000;
    return new Date(current);
  };
}

function createInput(overrides: Partial<RecordOutcomeInput> = {}): RecordOutcomeInput {
  return {
    decisionHash: 'abc123',
    mrn: 'MRN001',
    predictedProbSafe: 0.85,
    predictedRiskCategory: 'low',
    actualOutcome: 'safe',
    outcomeDetails: 'No complications',
    daysToOutcome: 7,
    outcomeSeverity: 1,
    recordedBy: 'dr_test',
    ...overrides,
  };
}
