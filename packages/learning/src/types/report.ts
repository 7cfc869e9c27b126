/**
 * Learning Report Types
 *
 * @module types/report
 */

import type { PriorSummary } from './bayesian.js';
import type { CalibrationReport } from './calibration.js';
import type { OutcomeMetadata, OutcomeType } from './outcome.js';

export const REPORT_TYPES = ['comprehensive', 'calibration', 'outcomes', 'summary'] as const;

export type ReportType = (typeof REPORT_TYPES)[number];

export interface ModelPerformance {
  brierScore: number;
  accuracy: number;
  nCorrect: number;
  nEvaluated: number;
}

export interface SeverityAnalysis {
  avgAdverseSeverity: number;
  minAdverseSeverity: number;
  maxAdverseSeverity: number;
}

export interface DailyOutcomeStats {
  /** YYYY-MM-DD */
  date: string;
  count: number;
  safeCount: number;
  adverseCount: number;
  avgPrediction: number | null;
}

export interface RiskCategoryPerformance {
  category: string;
  count: number;
  safeCount: number;
  adverseCount: number;
  unknownCount: number;
  /** Safe outcomes over all outcomes in the category */
  observedSafeRate: number;
  /** Share of known outcomes where the prediction agreed */
  accuracy: number;
}

/**
 * Generated learning report. Persisted as an opaque JSON blob.
 */
export interface LearningReport {
  reportType: ReportType;
  generatedAt: string;
  totalOutcomes: number;
  evaluatedOutcomes: number;
  outcomeDistribution: Record<OutcomeType, number>;
  modelPerformance: ModelPerformance;
  calibration: CalibrationReport;
  currentPriors: PriorSummary;
  severityAnalysis?: SeverityAnalysis;
  dailyStats?: DailyOutcomeStats[];
  riskCategoryPerformance?: RiskCategoryPerformance[];
}

/**
 * Outcome as written to an export file
 */
export interface ExportedOutcome {
  decisionHash: string;
  mrn: string;
  predictedProbSafe: number;
  predictedRiskCategory: string;
  actualOutcome: OutcomeType;
  outcomeDetails: string;
  daysToOutcome: number;
  outcomeSeverity: number;
  recordedBy: string;
  recordedAt: string;
  outcomeHash: string;
  metadata: OutcomeMetadata;
}

export interface OutcomeExport {
  exportTimestamp: string;
  totalOutcomes: number;
  calibration: CalibrationReport;
  currentPriors: PriorSummary;
  outcomes: ExportedOutcome[];
}
