/**
 * Bayesian Updater
 *
 * Maintains a Beta(alpha, beta) belief over the probability that an
 * intervention outcome is safe.
 *
 * Each known outcome adds `learningRate` pseudo-counts: safe outcomes to
 * alpha, adverse outcomes to beta. This is a damped form of the
 * Beta-Binomial conjugate update (which would add whole counts), so a
 * single outcome moves the prior only slightly.
 *
 * @module bayesian/updater
 */

import { OutcomeValidationError } from '../errors.js';
import { isKnownOutcome } from '../outcomes/outcome-type.js';
import type {
  BayesianUpdaterState,
  PosteriorEstimate,
  PriorSummary,
  PriorUpdateRecord,
  PriorUpdateResult,
} from '../types/bayesian.js';
import type { OutcomeType } from '../types/outcome.js';
import { roundTo } from '../utils/math.js';
import { now, systemClock, type Clock } from '../utils/time.js';
import { betaCredibleInterval, betaMean, betaVariance } from './beta.js';
import type { PredictionOutcomePair } from '../calibration/tracker.js';

export const DEFAULT_ALPHA = 8.0;
export const DEFAULT_BETA = 2.0;
export const DEFAULT_LEARNING_RATE = 0.1;

export interface BayesianUpdaterOptions {
  initialAlpha?: number;
  initialBeta?: number;
  /** Update records kept in memory and in serialized state (default: 100) */
  historyLimit?: number;
  clock?: Clock;
}

function assertShape(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new OutcomeValidationError(`${name} must be a positive number, got ${value}`);
  }
}

function assertLearningRate(learningRate: number): void {
  if (!Number.isFinite(learningRate) || learningRate <= 0) {
    throw new OutcomeValidationError(`Learning rate must be a positive number, got ${learningRate}`);
  }
}

function isCount(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

export class BayesianUpdater {
  alpha: number;
  beta: number;
  readonly initialAlpha: number;
  readonly initialBeta: number;
  nUpdates = 0;

  private readonly historyLimit: number;
  private readonly clock: Clock;
  private updateHistory: PriorUpdateRecord[] = [];

  constructor(options: BayesianUpdaterOptions = {}) {
    this.initialAlpha = options.initialAlpha ?? DEFAULT_ALPHA;
    this.initialBeta = options.initialBeta ?? DEFAULT_BETA;
    assertShape('alpha', this.initialAlpha);
    assertShape('beta', this.initialBeta);

    this.alpha = this.initialAlpha;
    this.beta = this.initialBeta;
    this.historyLimit = options.historyLimit ?? 100;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Update the prior from one observed outcome.
   *
   * Unknown outcomes carry no evidence and are rejected; callers filter
   * them out first.
   */
  updateFromOutcome(
    predictedProbSafe: number,
    actualOutcome: OutcomeType,
    learningRate: number = DEFAULT_LEARNING_RATE
  ): PriorUpdateResult {
    if (!isKnownOutcome(actualOutcome)) {
      throw new OutcomeValidationError('Unknown outcomes cannot update the prior');
    }
    assertLearningRate(learningRate);

    const oldAlpha = this.alpha;
    const oldBeta = this.beta;

    if (actualOutcome === 'safe') {
      this.alpha += learningRate;
    } else {
      this.beta += learningRate;
    }
    this.nUpdates++;

    this.updateHistory.push({
      timestamp: now(this.clock),
      updateNumber: this.nUpdates,
      predictedProb: predictedProbSafe,
      outcome: actualOutcome,
      oldAlpha,
      oldBeta,
      newAlpha: this.alpha,
      newBeta: this.beta,
      learningRate,
    });
    if (this.updateHistory.length > this.historyLimit) {
      this.updateHistory.shift();
    }

    return {
      alpha: this.alpha,
      beta: this.beta,
      priorMean: betaMean(this.alpha, this.beta),
    };
  }

  /**
   * Apply updates sequentially, in list order
   */
  batchUpdate(
    outcomes: readonly PredictionOutcomePair[],
    learningRate: number = DEFAULT_LEARNING_RATE
  ): PriorSummary {
    for (const [predictedProb, outcome] of outcomes) {
      this.updateFromOutcome(predictedProb, outcome, learningRate);
    }
    return this.getCurrentPrior();
  }

  getCurrentPrior(): PriorSummary {
    const interval = betaCredibleInterval(this.alpha, this.beta);

    return {
      alpha: this.alpha,
      beta: this.beta,
      priorMean: roundTo(betaMean(this.alpha, this.beta), 4),
      priorVariance: roundTo(betaVariance(this.alpha, this.beta), 6),
      ciLow: roundTo(interval.low, 4),
      ciHigh: roundTo(interval.high, 4),
      nUpdates: this.nUpdates,
    };
  }

  /**
   * Posterior after hypothetical observations. Does not touch state.
   */
  getPosteriorProbability(nSafe: number, nAdverse: number): PosteriorEstimate {
    if (!isCount(nSafe) || !isCount(nAdverse)) {
      throw new OutcomeValidationError(
        `Observation counts must be finite and non-negative, got ${nSafe} and ${nAdverse}`
      );
    }

    const posteriorAlpha = this.alpha + nSafe;
    const posteriorBeta = this.beta + nAdverse;
    const interval = betaCredibleInterval(posteriorAlpha, posteriorBeta);

    return {
      probSafe: roundTo(betaMean(posteriorAlpha, posteriorBeta), 4),
      ciLow: roundTo(interval.low, 4),
      ciHigh: roundTo(interval.high, 4),
      posteriorAlpha,
      posteriorBeta,
    };
  }

  /**
   * Reset to the given values, or to the configured initial prior
   */
  resetPriors(alpha?: number, beta?: number): void {
    const nextAlpha = alpha ?? this.initialAlpha;
    const nextBeta = beta ?? this.initialBeta;
    assertShape('alpha', nextAlpha);
    assertShape('beta', nextBeta);

    this.alpha = nextAlpha;
    this.beta = nextBeta;
    this.updateHistory = [];
    this.nUpdates = 0;
  }

  getUpdateHistory(): readonly PriorUpdateRecord[] {
    return this.updateHistory;
  }

  /**
   * Overwrite the mutable state, e.g. to roll back after a failed write
   */
  restoreState(state: Pick<BayesianUpdaterState, 'alpha' | 'beta' | 'nUpdates' | 'updateHistory'>): void {
    assertShape('alpha', state.alpha);
    assertShape('beta', state.beta);
    this.alpha = state.alpha;
    this.beta = state.beta;
    this.nUpdates = state.nUpdates;
    this.updateHistory = state.updateHistory.slice(-this.historyLimit);
  }

  toJSON(): BayesianUpdaterState {
    return {
      alpha: this.alpha,
      beta: this.beta,
      initialAlpha: this.initialAlpha,
      initialBeta: this.initialBeta,
      nUpdates: this.nUpdates,
      updateHistory: this.updateHistory.slice(-this.historyLimit),
    };
  }

  static fromJSON(
    state: BayesianUpdaterState,
    options: Omit<BayesianUpdaterOptions, 'initialAlpha' | 'initialBeta'> = {}
  ): BayesianUpdater {
    const updater = new BayesianUpdater({
      ...options,
      initialAlpha: state.initialAlpha,
      initialBeta: state.initialBeta,
    });
    updater.restoreState(state);
    return updater;
  }
}
