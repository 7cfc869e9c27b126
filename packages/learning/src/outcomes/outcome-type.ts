/**
 * Outcome type parsing
 *
 * @module outcomes/outcome-type
 */

import { OUTCOME_TYPES } from '../types/outcome.js';
import type { KnownOutcome, OutcomeType } from '../types/outcome.js';

/**
 * Coerce a stored value to an outcome tag. Anything unrecognized
 * becomes `unknown`.
 */
export function parseOutcomeType(raw: unknown): OutcomeType {
  for (const type of OUTCOME_TYPES) {
    if (raw === type) return type;
  }
  return 'unknown';
}

/**
 * Whether a raw stored value is a recognized outcome tag
 */
export function isOutcomeType(raw: unknown): raw is OutcomeType {
  return OUTCOME_TYPES.some(type => type === raw);
}

export function isKnownOutcome(outcome: OutcomeType): outcome is KnownOutcome {
  return outcome !== 'unknown';
}

/**
 * 1 for a safe outcome, 0 otherwise
 */
export function safeIndicator(outcome: OutcomeType): number {
  return outcome === 'safe' ? 1 : 0;
}

/**
 * A prediction is correct when p >= 0.5 agrees with an actual safe outcome
 */
export function predictionAgrees(predictedProbSafe: number, outcome: OutcomeType): boolean {
  return (predictedProbSafe >= 0.5) === (outcome === 'safe');
}
