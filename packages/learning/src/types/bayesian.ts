/**
 * Bayesian Prior Types
 *
 * @module types/bayesian
 */

import type { KnownOutcome } from './outcome.js';

/**
 * Current Beta(alpha, beta) prior with derived statistics
 */
export interface PriorSummary {
  alpha: number;
  beta: number;
  priorMean: number;
  priorVariance: number;
  /** Lower bound of the 95% credible interval */
  ciLow: number;
  /** Upper bound of the 95% credible interval */
  ciHigh: number;
  nUpdates: number;
}

/**
 * Result of a single prior update
 */
export interface PriorUpdateResult {
  alpha: number;
  beta: number;
  priorMean: number;
}

/**
 * Hypothetical posterior for a what-if query
 */
export interface PosteriorEstimate {
  probSafe: number;
  ciLow: number;
  ciHigh: number;
  posteriorAlpha: number;
  posteriorBeta: number;
}

/**
 * One entry of the in-memory update history
 */
export interface PriorUpdateRecord {
  timestamp: string;
  updateNumber: number;
  predictedProb: number;
  outcome: KnownOutcome;
  oldAlpha: number;
  oldBeta: number;
  newAlpha: number;
  newBeta: number;
  learningRate: number;
}

/**
 * Serialized updater state
 */
export interface BayesianUpdaterState {
  alpha: number;
  beta: number;
  initialAlpha: number;
  initialBeta: number;
  nUpdates: number;
  updateHistory: PriorUpdateRecord[];
}

/**
 * A persisted prior-update event, as returned by prior history queries
 */
export interface PriorHistoryEntry {
  updatedAt: string;
  outcomeHash: string | null;
  oldAlpha: number;
  oldBeta: number;
  newAlpha: number;
  newBeta: number;
  learningRate: number;
  oldMean: number;
  newMean: number;
}
