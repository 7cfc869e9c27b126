/**
 * SQLite Outcome Store
 *
 * IOutcomeStore backed by better-sqlite3.
 */

import { z } from 'zod';

import { DuplicateOutcomeError, StaleLearningStateError } from '../../errors.js';
import type { CalibrationBucketDetail, CalibrationReport, CalibrationSnapshot } from '../../types/calibration.js';
import type { OutcomeMetadata, OutcomeRecord } from '../../types/outcome.js';
import type { ReportType } from '../../types/report.js';
import type { Logger } from '../../utils/logger.js';
import type {
  DailyStatsRow,
  IOutcomeStore,
  IntegrityRow,
  LearningStateRow,
  PriorUpdateEvent,
  RiskCategoryRow,
  SeverityStatsRow,
  StoredOutcome,
  StoredPredictionOutcome,
  StoredReport,
} from '../interface.js';
import { SQLiteClient } from './client.js';
import { SCHEMA, SCHEMA_VERSION } from './schema.js';
import * as Q from './queries.js';

interface OutcomeRow {
  id: number;
  decision_hash: string;
  mrn: string;
  predicted_prob_safe: number;
  predicted_risk_category: string | null;
  actual_outcome: string;
  outcome_details: string | null;
  days_to_outcome: number | null;
  outcome_severity: number | null;
  recorded_by: string;
  recorded_at: string;
  outcome_hash: string;
  metadata: string | null;
}

interface PriorUpdateRow {
  updated_at: string;
  outcome_hash: string | null;
  old_alpha: number;
  old_beta: number;
  new_alpha: number;
  new_beta: number;
  learning_rate: number;
}

interface SnapshotRow {
  snapshot_at: string;
  ece: number;
  mce: number;
  total_predictions: number | null;
  total_safe_outcomes: number | null;
  bucket_data: string;
}

const metadataSchema = z.record(z.string(), z.unknown());

const bucketDetailsSchema = z.array(
  z.object({
    range: z.string(),
    nPredictions: z.number(),
    nSafeOutcomes: z.number(),
    observedSafeRate: z.number(),
    expectedSafeRate: z.number(),
    calibrationError: z.number(),
  })
);

/**
 * Parse a JSON column against a schema, falling back when it is
 * missing or malformed
 */
function parseJsonColumn<T>(raw: string | null, schema: z.ZodType<T>, fallback: T): T {
  if (!raw) return fallback;
  try {
    const result = schema.safeParse(JSON.parse(raw));
    return result.success ? result.data : fallback;
  } catch {
    return fallback;
  }
}

function isConstraintViolation(err: unknown, codes: readonly string[]): boolean {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' && codes.includes(err.code);
}

function toStoredOutcome(row: OutcomeRow): StoredOutcome {
  return {
    id: row.id,
    decisionHash: row.decision_hash,
    mrn: row.mrn,
    predictedProbSafe: row.predicted_prob_safe,
    predictedRiskCategory: row.predicted_risk_category ?? '',
    actualOutcome: row.actual_outcome,
    outcomeDetails: row.outcome_details ?? '',
    daysToOutcome: row.days_to_outcome ?? 0,
    outcomeSeverity: row.outcome_severity ?? 0,
    recordedBy: row.recorded_by,
    recordedAt: row.recorded_at,
    outcomeHash: row.outcome_hash,
    metadata: parseJsonColumn<OutcomeMetadata>(row.metadata, metadataSchema, {}),
  };
}

export interface SQLiteOutcomeStoreOptions {
  walMode?: boolean;
  /** Receives every executed statement at debug level */
  logger?: Logger;
}

/**
 * SQLite implementation of the outcome store
 */
export class SQLiteOutcomeStore implements IOutcomeStore {
  private readonly sqlite: SQLiteClient;

  constructor(dbPath: string, options: SQLiteOutcomeStoreOptions = {}) {
    this.sqlite = new SQLiteClient({ dbPath, ...options });
  }

  /**
   * The underlying client, for maintenance and tests
   */
  get client(): SQLiteClient {
    return this.sqlite;
  }

  initialize(): void {
    this.sqlite.exec(SCHEMA);
    if (this.sqlite.userVersion < SCHEMA_VERSION) {
      this.sqlite.userVersion = SCHEMA_VERSION;
    }
  }

  close(): void {
    if (this.sqlite.isOpen) {
      this.sqlite.close();
    }
  }

  transaction<T>(fn: () => T): T {
    return this.sqlite.transaction(fn);
  }

  // ==========================================================================
  // Outcomes
  // ==========================================================================

  insertOutcome(record: OutcomeRecord): number {
    try {
      const result = this.sqlite.prepare(Q.INSERT_OUTCOME).run(
        record.decisionHash,
        record.mrn,
        record.predictedProbSafe,
        record.predictedRiskCategory,
        record.actualOutcome,
        record.outcomeDetails,
        record.daysToOutcome,
        record.outcomeSeverity,
        record.recordedBy,
        record.recordedAt,
        record.outcomeHash,
        JSON.stringify(record.metadata)
      );
      return Number(result.lastInsertRowid);
    } catch (err) {
      if (isConstraintViolation(err, ['SQLITE_CONSTRAINT_UNIQUE'])) {
        throw new DuplicateOutcomeError(
          record.decisionHash,
          record.recordedAt,
          err instanceof Error ? err : undefined
        );
      }
      throw err;
    }
  }

  listPredictionOutcomes(): StoredPredictionOutcome[] {
    const rows = this.sqlite
      .prepare<{ predicted_prob_safe: number; actual_outcome: string }>(Q.LIST_PREDICTION_OUTCOMES)
      .all();
    return rows.map(r => ({ predictedProbSafe: r.predicted_prob_safe, actualOutcome: r.actual_outcome }));
  }

  findLatestOutcome(decisionHash: string): StoredOutcome | null {
    const row = this.sqlite.prepare<OutcomeRow>(Q.FIND_LATEST_OUTCOME).get(decisionHash);
    return row ? toStoredOutcome(row) : null;
  }

  findOutcomesByPatient(mrn: string, limit: number): StoredOutcome[] {
    return this.sqlite.prepare<OutcomeRow>(Q.FIND_OUTCOMES_BY_PATIENT).all(mrn, limit).map(toStoredOutcome);
  }

  listOutcomes(): StoredOutcome[] {
    return this.sqlite.prepare<OutcomeRow>(Q.LIST_OUTCOMES).all().map(toStoredOutcome);
  }

  listIntegrityRows(): IntegrityRow[] {
    const rows = this.sqlite
      .prepare<Pick<OutcomeRow, 'id' | 'decision_hash' | 'mrn' | 'actual_outcome' | 'recorded_at' | 'outcome_hash'>>(
        Q.LIST_INTEGRITY_ROWS
      )
      .all();
    return rows.map(r => ({
      id: r.id,
      decisionHash: r.decision_hash,
      mrn: r.mrn,
      actualOutcome: r.actual_outcome,
      recordedAt: r.recorded_at,
      outcomeHash: r.outcome_hash,
    }));
  }

  // ==========================================================================
  // Prior state
  // ==========================================================================

  insertPriorUpdate(event: PriorUpdateEvent): void {
    this.sqlite.prepare(Q.INSERT_PRIOR_UPDATE).run(
      event.updatedAt,
      event.outcomeHash,
      event.oldAlpha,
      event.oldBeta,
      event.newAlpha,
      event.newBeta,
      event.learningRate
    );
  }

  listPriorUpdates(limit: number): PriorUpdateEvent[] {
    return this.sqlite
      .prepare<PriorUpdateRow>(Q.LIST_PRIOR_UPDATES)
      .all(limit)
      .map(r => ({
        updatedAt: r.updated_at,
        outcomeHash: r.outcome_hash,
        oldAlpha: r.old_alpha,
        oldBeta: r.old_beta,
        newAlpha: r.new_alpha,
        newBeta: r.new_beta,
        learningRate: r.learning_rate,
      }));
  }

  readLearningState(): LearningStateRow | null {
    const row = this.sqlite
      .prepare<{
        current_alpha: number;
        current_beta: number;
        n_updates: number | null;
        last_updated: string;
        version: number;
      }>(Q.GET_LEARNING_STATE)
      .get();

    if (!row) return null;
    return {
      alpha: row.current_alpha,
      beta: row.current_beta,
      nUpdates: row.n_updates ?? 0,
      lastUpdated: row.last_updated,
      version: row.version,
    };
  }

  writeLearningState(state: Omit<LearningStateRow, 'version'>, expectedVersion: number): number {
    if (expectedVersion === 0) {
      try {
        this.sqlite
          .prepare(Q.INSERT_LEARNING_STATE)
          .run(state.alpha, state.beta, state.nUpdates, state.lastUpdated);
      } catch (err) {
        if (isConstraintViolation(err, ['SQLITE_CONSTRAINT_PRIMARYKEY', 'SQLITE_CONSTRAINT_UNIQUE'])) {
          throw new StaleLearningStateError(expectedVersion);
        }
        throw err;
      }
      return 1;
    }

    const result = this.sqlite
      .prepare(Q.UPDATE_LEARNING_STATE)
      .run(state.alpha, state.beta, state.nUpdates, state.lastUpdated, expectedVersion);
    if (result.changes === 0) {
      throw new StaleLearningStateError(expectedVersion);
    }
    return expectedVersion + 1;
  }

  // ==========================================================================
  // Calibration snapshots
  // ==========================================================================

  insertCalibrationSnapshot(report: CalibrationReport): void {
    this.sqlite.prepare(Q.INSERT_CALIBRATION_SNAPSHOT).run(
      report.timestamp,
      report.ece,
      report.mce,
      report.totalPredictions,
      report.totalSafeOutcomes,
      JSON.stringify(report.buckets)
    );
  }

  listCalibrationSnapshots(limit: number): CalibrationSnapshot[] {
    return this.sqlite
      .prepare<SnapshotRow>(Q.LIST_CALIBRATION_SNAPSHOTS)
      .all(limit)
      .map(r => ({
        snapshotAt: r.snapshot_at,
        ece: r.ece,
        mce: r.mce,
        totalPredictions: r.total_predictions ?? 0,
        totalSafeOutcomes: r.total_safe_outcomes ?? 0,
        buckets: parseJsonColumn<CalibrationBucketDetail[]>(r.bucket_data, bucketDetailsSchema, []),
      }));
  }

  // ==========================================================================
  // Reports
  // ==========================================================================

  insertReport(generatedAt: string, reportType: ReportType, reportData: string): void {
    this.sqlite.prepare(Q.INSERT_REPORT).run(generatedAt, reportType, reportData);
  }

  listReports(limit: number): StoredReport[] {
    return this.sqlite
      .prepare<{ id: number; generated_at: string; report_type: string; report_data: string }>(Q.LIST_REPORTS)
      .all(limit)
      .map(r => ({
        id: r.id,
        generatedAt: r.generated_at,
        reportType: r.report_type,
        reportData: r.report_data,
      }));
  }

  dailyStats(limit: number): DailyStatsRow[] {
    return this.sqlite
      .prepare<{
        day: string;
        count: number;
        safe_count: number;
        adverse_count: number;
        avg_prediction: number | null;
      }>(Q.DAILY_OUTCOME_STATS)
      .all(limit)
      .map(r => ({
        date: r.day,
        count: r.count,
        safeCount: r.safe_count,
        adverseCount: r.adverse_count,
        avgPrediction: r.avg_prediction,
      }));
  }

  riskCategoryStats(): RiskCategoryRow[] {
    return this.sqlite
      .prepare<{
        category: string;
        count: number;
        safe_count: number;
        adverse_count: number;
        n_correct: number;
      }>(Q.RISK_CATEGORY_STATS)
      .all()
      .map(r => ({
        category: r.category,
        count: r.count,
        safeCount: r.safe_count,
        adverseCount: r.adverse_count,
        nCorrect: r.n_correct,
      }));
  }

  adverseSeverityStats(): SeverityStatsRow | null {
    const row = this.sqlite
      .prepare<{
        avg_severity: number | null;
        min_severity: number | null;
        max_severity: number | null;
      }>(Q.ADVERSE_SEVERITY_STATS)
      .get();

    if (!row || row.avg_severity === null || row.min_severity === null || row.max_severity === null) {
      return null;
    }
    return {
      avgSeverity: row.avg_severity,
      minSeverity: row.min_severity,
      maxSeverity: row.max_severity,
    };
  }
}
