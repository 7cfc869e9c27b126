/**
 * Outcome Types
 *
 * Types describing a clinical outcome captured after a recommendation,
 * and the views the pipeline derives from stored outcomes.
 *
 * @module types/outcome
 */

/**
 * All outcome tags, in storage form
 */
export const OUTCOME_TYPES = ['safe', 'adverse', 'unknown'] as const;

/**
 * What actually happened after a recommendation.
 *
 * `unknown` is a valid terminal state and also the fallback for
 * malformed values read back from storage. It is counted, but never
 * feeds calibration or the prior.
 */
export type OutcomeType = (typeof OUTCOME_TYPES)[number];

/**
 * An outcome that can be scored against a prediction
 */
export type KnownOutcome = Exclude<OutcomeType, 'unknown'>;

/**
 * Free-form metadata attached to an outcome
 */
export type OutcomeMetadata = Record<string, unknown>;

/**
 * Fields supplied by the caller when recording an outcome
 */
export interface RecordOutcomeInput {
  /** Identifier of the original prediction event */
  decisionHash: string;
  /** Patient identifier */
  mrn: string;
  /** Predicted probability that the intervention is safe (0.0 - 1.0) */
  predictedProbSafe: number;
  /** Risk label produced alongside the prediction */
  predictedRiskCategory: string;
  actualOutcome: OutcomeType;
  outcomeDetails: string;
  /** Days from recommendation to outcome */
  daysToOutcome: number;
  /** Severity 1 (mild) - 5 (severe) */
  outcomeSeverity: number;
  recordedBy: string;
  /** ISO timestamp; defaults to the pipeline clock */
  recordedAt?: string;
  metadata?: OutcomeMetadata;
}

/**
 * An immutable, hashed outcome record
 */
export interface OutcomeRecord {
  readonly decisionHash: string;
  readonly mrn: string;
  readonly predictedProbSafe: number;
  readonly predictedRiskCategory: string;
  readonly actualOutcome: OutcomeType;
  readonly outcomeDetails: string;
  readonly daysToOutcome: number;
  readonly outcomeSeverity: number;
  readonly recordedBy: string;
  readonly recordedAt: string;
  readonly metadata: Readonly<OutcomeMetadata>;
  /** SHA-256 over the canonical hashed fields */
  readonly outcomeHash: string;
}

/**
 * The fields covered by the outcome hash
 */
export interface HashedOutcomeFields {
  decisionHash: string;
  mrn: string;
  /** Raw storage value, so tampered text is hashed as-is */
  actualOutcome: string;
  recordedAt: string;
}

/**
 * Predicted vs actual comparison for one decision
 */
export interface PredictionComparison {
  decisionHash: string;
  predictedProbSafe: number;
  predictedRiskCategory: string;
  actualOutcome: OutcomeType;
  outcomeSeverity: number;
  outcomeDetails: string;
  recordedAt: string;
  /** |predicted - actual safe indicator| */
  predictionError: number;
  /** Prediction >= 0.5 agrees with an actual safe outcome */
  predictionCorrect: boolean;
  /** Squared error for this single prediction */
  brierScore: number;
}

/**
 * Outcome as listed in a patient's history
 */
export interface PatientOutcome {
  decisionHash: string;
  predictedProbSafe: number;
  predictedRiskCategory: string;
  actualOutcome: OutcomeType;
  outcomeDetails: string;
  daysToOutcome: number;
  outcomeSeverity: number;
  recordedAt: string;
  recordedBy: string;
}

/**
 * Result of recomputing every stored outcome hash
 */
export interface IntegrityReport {
  valid: boolean;
  totalOutcomes: number;
  validOutcomes: number;
  /** Row ids whose stored hash no longer matches */
  invalidIds: number[];
  verifiedAt: string;
}
