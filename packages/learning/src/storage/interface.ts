/**
 * Outcome Store Interface
 *
 * Store-agnostic contract for the durable side of the learning loop.
 * All methods are synchronous; a single logical writer is assumed.
 */

import type { CalibrationReport, CalibrationSnapshot } from '../types/calibration.js';
import type { OutcomeMetadata, OutcomeRecord } from '../types/outcome.js';
import type { ReportType } from '../types/report.js';

/**
 * An outcome row as stored. `actualOutcome` is the raw column value and
 * may hold anything if the row was edited out-of-band.
 */
export interface StoredOutcome {
  id: number;
  decisionHash: string;
  mrn: string;
  predictedProbSafe: number;
  predictedRiskCategory: string;
  actualOutcome: string;
  outcomeDetails: string;
  daysToOutcome: number;
  outcomeSeverity: number;
  recordedBy: string;
  recordedAt: string;
  outcomeHash: string;
  metadata: OutcomeMetadata;
}

/**
 * The hashed columns of an outcome row
 */
export interface IntegrityRow {
  id: number;
  decisionHash: string;
  mrn: string;
  actualOutcome: string;
  recordedAt: string;
  outcomeHash: string;
}

export interface StoredPredictionOutcome {
  predictedProbSafe: number;
  actualOutcome: string;
}

/**
 * A persisted prior update event
 */
export interface PriorUpdateEvent {
  updatedAt: string;
  outcomeHash: string | null;
  oldAlpha: number;
  oldBeta: number;
  newAlpha: number;
  newBeta: number;
  learningRate: number;
}

/**
 * The singleton learning state row
 */
export interface LearningStateRow {
  alpha: number;
  beta: number;
  nUpdates: number;
  lastUpdated: string;
  /** Monotonic write counter, 0 when no row exists yet */
  version: number;
}

export interface StoredReport {
  id: number;
  generatedAt: string;
  reportType: string;
  reportData: string;
}

export interface DailyStatsRow {
  date: string;
  count: number;
  safeCount: number;
  adverseCount: number;
  avgPrediction: number | null;
}

export interface RiskCategoryRow {
  category: string;
  count: number;
  safeCount: number;
  adverseCount: number;
  nCorrect: number;
}

export interface SeverityStatsRow {
  avgSeverity: number;
  minSeverity: number;
  maxSeverity: number;
}

/**
 * Outcome store interface
 */
export interface IOutcomeStore {
  // Lifecycle
  /** Create the schema if missing. Idempotent. */
  initialize(): void;
  close(): void;
  /** Run fn atomically; nothing it wrote survives if it throws */
  transaction<T>(fn: () => T): T;

  // Outcomes
  /** Insert an outcome; throws DuplicateOutcomeError on a uniqueness clash */
  insertOutcome(record: OutcomeRecord): number;
  listPredictionOutcomes(): StoredPredictionOutcome[];
  findLatestOutcome(decisionHash: string): StoredOutcome | null;
  findOutcomesByPatient(mrn: string, limit: number): StoredOutcome[];
  listOutcomes(): StoredOutcome[];
  listIntegrityRows(): IntegrityRow[];

  // Prior state
  insertPriorUpdate(event: PriorUpdateEvent): void;
  listPriorUpdates(limit: number): PriorUpdateEvent[];
  readLearningState(): LearningStateRow | null;
  /**
   * Write the state row if its version still equals expectedVersion.
   * Returns the new version; throws StaleLearningStateError otherwise.
   */
  writeLearningState(state: Omit<LearningStateRow, 'version'>, expectedVersion: number): number;

  // Calibration snapshots
  insertCalibrationSnapshot(report: CalibrationReport): void;
  listCalibrationSnapshots(limit: number): CalibrationSnapshot[];

  // Reports
  insertReport(generatedAt: string, reportType: ReportType, reportData: string): void;
  listReports(limit: number): StoredReport[];
  dailyStats(limit: number): DailyStatsRow[];
  riskCategoryStats(): RiskCategoryRow[];
  adverseSeverityStats(): SeverityStatsRow | null;
}
