/**
 * Learning Pipeline
 *
 * Closes the loop between predictions and what actually happened:
 * records outcomes, feeds known ones into the calibration tracker and
 * the Beta prior, and persists everything through an IOutcomeStore.
 *
 * In-memory state is rebuilt from storage on construction. The learning
 * state row is written with a compare-and-swap on its version, so a
 * second writer on the same database fails with StaleLearningStateError
 * instead of silently overwriting the prior.
 *
 * @module pipeline/learning-pipeline
 */

import * as fs from 'fs';

import { BayesianUpdater } from '../bayesian/updater.js';
import { betaMean } from '../bayesian/beta.js';
import { CalibrationTracker } from '../calibration/tracker.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { learningConfigSchema } from '../config/schema.js';
import type { LearningConfig } from '../config/types.js';
import { OutcomeValidationError } from '../errors.js';
import { computeOutcomeHash, createOutcomeRecord } from '../outcomes/outcome-record.js';
import {
  isKnownOutcome,
  isOutcomeType,
  parseOutcomeType,
  predictionAgrees,
  safeIndicator,
} from '../outcomes/outcome-type.js';
import { formatIssues } from '../outcomes/schema.js';
import type { IOutcomeStore, StoredOutcome } from '../storage/interface.js';
import { createOutcomeStore } from '../storage/factory.js';
import type { PosteriorEstimate, PriorHistoryEntry, PriorSummary } from '../types/bayesian.js';
import type { CalibrationReport, CalibrationSnapshot } from '../types/calibration.js';
import type {
  IntegrityReport,
  OutcomeRecord,
  OutcomeType,
  PatientOutcome,
  PredictionComparison,
  RecordOutcomeInput,
} from '../types/outcome.js';
import type {
  ExportedOutcome,
  LearningReport,
  OutcomeExport,
  ReportType,
  RiskCategoryPerformance,
} from '../types/report.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { roundTo } from '../utils/math.js';
import { now, systemClock, type Clock } from '../utils/time.js';

/** Days included in a comprehensive report's daily breakdown */
const DAILY_STATS_DAYS = 30;

export type PipelineState = 'uninitialized' | 'initialized' | 'loaded' | 'operational';

export interface LearningPipelineOptions {
  /** Defaults to a console logger at the configured level */
  logger?: Logger;
  clock?: Clock;
}

export class LearningPipeline {
  readonly config: LearningConfig;

  private readonly store: IOutcomeStore;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private tracker: CalibrationTracker;
  private updater: BayesianUpdater;
  /** Version of the learning state row this process last saw, 0 if none */
  private stateVersion = 0;
  private currentState: PipelineState = 'uninitialized';

  constructor(
    store: IOutcomeStore,
    config: Partial<LearningConfig> = {},
    options: LearningPipelineOptions = {}
  ) {
    const parsed = learningConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...config });
    if (!parsed.success) {
      throw new OutcomeValidationError('Invalid learning configuration', formatIssues(parsed.error));
    }
    this.config = parsed.data;
    this.store = store;
    this.logger = options.logger ?? createLogger({ level: this.config.logLevel });
    this.clock = options.clock ?? systemClock;

    this.store.initialize();
    this.currentState = 'initialized';

    this.tracker = this.createTracker();
    this.updater = this.createUpdater();
    this.loadState();
  }

  get state(): PipelineState {
    return this.currentState;
  }

  // ==========================================================================
  // State loading
  // ==========================================================================

  private createTracker(): CalibrationTracker {
    return new CalibrationTracker({
      nBuckets: this.config.calibrationBuckets,
      historyLimit: this.config.historyLimit,
      clock: this.clock,
    });
  }

  private createUpdater(): BayesianUpdater {
    return new BayesianUpdater({
      initialAlpha: this.config.initialAlpha,
      initialBeta: this.config.initialBeta,
      historyLimit: this.config.historyLimit,
      clock: this.clock,
    });
  }

  /**
   * Map a stored outcome string to a tag, logging values that are not
   * recognized
   */
  private coerceOutcome(raw: string): OutcomeType {
    if (!isOutcomeType(raw)) {
      this.logger.warn(`Unrecognized stored outcome "${raw}", treating as unknown`);
    }
    return parseOutcomeType(raw);
  }

  private loadState(): void {
    const tracker = this.createTracker();
    for (const row of this.store.listPredictionOutcomes()) {
      tracker.addPredictionOutcome(row.predictedProbSafe, this.coerceOutcome(row.actualOutcome));
    }

    const updater = this.createUpdater();
    const saved = this.store.readLearningState();
    if (saved) {
      updater.restoreState({
        alpha: saved.alpha,
        beta: saved.beta,
        nUpdates: saved.nUpdates,
        updateHistory: [],
      });
    }

    this.tracker = tracker;
    this.updater = updater;
    this.stateVersion = saved?.version ?? 0;
    this.currentState = 'loaded';

    this.logger.info(
      `Loaded learning state: alpha=${updater.alpha}, beta=${updater.beta}, ` +
        `${tracker.totalPredictions} calibrated predictions`
    );
    this.currentState = 'operational';
  }

  /**
   * Discard in-memory state and rebuild it from storage
   */
  reload(): void {
    this.currentState = 'initialized';
    this.loadState();
  }

  // ==========================================================================
  // Recording
  // ==========================================================================

  /**
   * Validate and persist an outcome. Known outcomes also update the
   * prior and the calibration tracker.
   *
   * @throws {OutcomeValidationError} When the input is invalid
   * @throws {DuplicateOutcomeError} When the decision already has an outcome at this timestamp
   * @throws {StaleLearningStateError} When another writer moved the learning state
   */
  recordOutcome(input: RecordOutcomeInput): OutcomeRecord {
    const record = createOutcomeRecord(input, this.clock);
    const outcome = record.actualOutcome;

    if (!isKnownOutcome(outcome)) {
      this.store.insertOutcome(record);
      this.logger.debug(`Recorded unknown outcome for decision ${record.decisionHash}`);
      return record;
    }

    const before = this.updater.toJSON();
    try {
      this.stateVersion = this.store.transaction(() => {
        this.store.insertOutcome(record);

        const updated = this.updater.updateFromOutcome(
          record.predictedProbSafe,
          outcome,
          this.config.learningRate
        );
        const timestamp = now(this.clock);

        this.store.insertPriorUpdate({
          updatedAt: timestamp,
          outcomeHash: record.outcomeHash,
          oldAlpha: before.alpha,
          oldBeta: before.beta,
          newAlpha: updated.alpha,
          newBeta: updated.beta,
          learningRate: this.config.learningRate,
        });

        return this.store.writeLearningState(
          {
            alpha: updated.alpha,
            beta: updated.beta,
            nUpdates: this.updater.nUpdates,
            lastUpdated: timestamp,
          },
          this.stateVersion
        );
      });
    } catch (error) {
      this.updater.restoreState(before);
      throw error;
    }

    this.tracker.addPredictionOutcome(record.predictedProbSafe, outcome);
    this.logger.debug(
      `Recorded ${outcome} outcome for decision ${record.decisionHash} ` +
        `(alpha=${this.updater.alpha}, beta=${this.updater.beta})`
    );
    return record;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Compare the latest outcome of a decision with its prediction
   */
  comparePredictionOutcome(decisionHash: string): PredictionComparison | null {
    const stored = this.store.findLatestOutcome(decisionHash);
    if (!stored) return null;

    const actual = this.coerceOutcome(stored.actualOutcome);
    const error = Math.abs(stored.predictedProbSafe - safeIndicator(actual));

    return {
      decisionHash: stored.decisionHash,
      predictedProbSafe: stored.predictedProbSafe,
      predictedRiskCategory: stored.predictedRiskCategory,
      actualOutcome: actual,
      outcomeSeverity: stored.outcomeSeverity,
      outcomeDetails: stored.outcomeDetails,
      recordedAt: stored.recordedAt,
      predictionError: roundTo(error, 4),
      predictionCorrect: predictionAgrees(stored.predictedProbSafe, actual),
      brierScore: roundTo(error ** 2, 4),
    };
  }

  getCurrentPriors(): PriorSummary {
    return this.updater.getCurrentPrior();
  }

  getCalibrationReport(): CalibrationReport {
    return this.tracker.getCalibrationReport();
  }

  /**
   * What-if posterior; the stored prior is not changed
   */
  getPosteriorProbability(nSafe: number, nAdverse: number): PosteriorEstimate {
    return this.updater.getPosteriorProbability(nSafe, nAdverse);
  }

  getPatientOutcomes(mrn: string, limit = 50): PatientOutcome[] {
    return this.store.findOutcomesByPatient(mrn, limit).map(row => ({
      decisionHash: row.decisionHash,
      predictedProbSafe: row.predictedProbSafe,
      predictedRiskCategory: row.predictedRiskCategory,
      actualOutcome: this.coerceOutcome(row.actualOutcome),
      outcomeDetails: row.outcomeDetails,
      daysToOutcome: row.daysToOutcome,
      outcomeSeverity: row.outcomeSeverity,
      recordedAt: row.recordedAt,
      recordedBy: row.recordedBy,
    }));
  }

  // ==========================================================================
  // Reports
  // ==========================================================================

  /**
   * Build a learning report from everything stored and persist it
   */
  generateLearningReport(reportType: ReportType = 'comprehensive'): LearningReport {
    const distribution: Record<OutcomeType, number> = { safe: 0, adverse: 0, unknown: 0 };
    let squaredError = 0;
    let nEvaluated = 0;
    let nCorrect = 0;

    for (const row of this.store.listPredictionOutcomes()) {
      const outcome = this.coerceOutcome(row.actualOutcome);
      distribution[outcome]++;
      if (!isKnownOutcome(outcome)) continue;

      squaredError += (row.predictedProbSafe - safeIndicator(outcome)) ** 2;
      nEvaluated++;
      if (predictionAgrees(row.predictedProbSafe, outcome)) {
        nCorrect++;
      }
    }

    const report: LearningReport = {
      reportType,
      generatedAt: now(this.clock),
      totalOutcomes: distribution.safe + distribution.adverse + distribution.unknown,
      evaluatedOutcomes: nEvaluated,
      outcomeDistribution: distribution,
      modelPerformance: {
        brierScore: nEvaluated > 0 ? roundTo(squaredError / nEvaluated, 4) : 0,
        accuracy: nEvaluated > 0 ? roundTo(nCorrect / nEvaluated, 4) : 0,
        nCorrect,
        nEvaluated,
      },
      calibration: this.tracker.getCalibrationReport(),
      currentPriors: this.updater.getCurrentPrior(),
    };

    const severity = this.store.adverseSeverityStats();
    if (severity) {
      report.severityAnalysis = {
        avgAdverseSeverity: roundTo(severity.avgSeverity, 2),
        minAdverseSeverity: severity.minSeverity,
        maxAdverseSeverity: severity.maxSeverity,
      };
    }

    if (reportType === 'comprehensive') {
      report.dailyStats = this.store.dailyStats(DAILY_STATS_DAYS).map(day => ({
        ...day,
        avgPrediction: day.avgPrediction === null ? null : roundTo(day.avgPrediction, 4),
      }));
      report.riskCategoryPerformance = this.store.riskCategoryStats().map(
        (row): RiskCategoryPerformance => {
          const known = row.safeCount + row.adverseCount;
          return {
            category: row.category,
            count: row.count,
            safeCount: row.safeCount,
            adverseCount: row.adverseCount,
            unknownCount: row.count - known,
            observedSafeRate: row.count > 0 ? roundTo(row.safeCount / row.count, 4) : 0,
            accuracy: known > 0 ? roundTo(row.nCorrect / known, 4) : 0,
          };
        }
      );
    }

    this.store.insertReport(report.generatedAt, reportType, JSON.stringify(report));
    return report;
  }

  /**
   * Write every outcome, oldest first, with the current calibration and
   * priors to a JSON file
   */
  exportOutcomes(outputPath: string = this.config.exportPath): OutcomeExport {
    const outcomes = this.store.listOutcomes().map(row => this.toExportedOutcome(row));

    const data: OutcomeExport = {
      exportTimestamp: now(this.clock),
      totalOutcomes: outcomes.length,
      calibration: this.tracker.getCalibrationReport(),
      currentPriors: this.updater.getCurrentPrior(),
      outcomes,
    };

    fs.writeFileSync(outputPath, JSON.stringify(data, null, 2), 'utf-8');
    this.logger.info(`Exported ${outcomes.length} outcomes to ${outputPath}`);
    return data;
  }

  private toExportedOutcome(row: StoredOutcome): ExportedOutcome {
    return {
      decisionHash: row.decisionHash,
      mrn: row.mrn,
      predictedProbSafe: row.predictedProbSafe,
      predictedRiskCategory: row.predictedRiskCategory,
      actualOutcome: this.coerceOutcome(row.actualOutcome),
      outcomeDetails: row.outcomeDetails,
      daysToOutcome: row.daysToOutcome,
      outcomeSeverity: row.outcomeSeverity,
      recordedBy: row.recordedBy,
      recordedAt: row.recordedAt,
      outcomeHash: row.outcomeHash,
      metadata: row.metadata,
    };
  }

  // ==========================================================================
  // History
  // ==========================================================================

  takeCalibrationSnapshot(): CalibrationReport {
    const report = this.tracker.snapshot();
    this.store.insertCalibrationSnapshot(report);
    return report;
  }

  getCalibrationHistory(limit = 30): CalibrationSnapshot[] {
    return this.store.listCalibrationSnapshots(limit);
  }

  getPriorHistory(limit = 100): PriorHistoryEntry[] {
    return this.store.listPriorUpdates(limit).map(event => ({
      ...event,
      oldMean: roundTo(betaMean(event.oldAlpha, event.oldBeta), 4),
      newMean: roundTo(betaMean(event.newAlpha, event.newBeta), 4),
    }));
  }

  // ==========================================================================
  // Integrity
  // ==========================================================================

  /**
   * Recompute every stored outcome hash. Mismatches are reported, not
   * repaired.
   */
  verifyOutcomeIntegrity(): IntegrityReport {
    const rows = this.store.listIntegrityRows();
    const invalidIds = rows.filter(row => computeOutcomeHash(row) !== row.outcomeHash).map(row => row.id);

    if (invalidIds.length > 0) {
      this.logger.warn(`Integrity check failed for outcome ids: ${invalidIds.join(', ')}`);
    }

    return {
      valid: invalidIds.length === 0,
      totalOutcomes: rows.length,
      validOutcomes: rows.length - invalidIds.length,
      invalidIds,
      verifiedAt: now(this.clock),
    };
  }

  close(): void {
    this.store.close();
  }
}

/**
 * Open the configured store and build a pipeline over it
 */
export function createLearningPipeline(
  config: Partial<LearningConfig> = {},
  options: LearningPipelineOptions = {}
): LearningPipeline {
  const logger = options.logger ?? createLogger({ level: config.logLevel ?? DEFAULT_CONFIG.logLevel });
  const store = createOutcomeStore({
    dbPath: config.dbPath ?? DEFAULT_CONFIG.dbPath,
    walMode: config.walMode ?? DEFAULT_CONFIG.walMode,
    ...(config.logLevel === 'debug' && { sqlLogger: logger }),
  });
  return new LearningPipeline(store, config, { ...options, logger });
}
