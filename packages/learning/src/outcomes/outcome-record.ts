/**
 * Outcome Record
 *
 * Builds immutable outcome records and computes their integrity hash.
 * The hash covers decision hash, MRN, outcome and timestamp only, so
 * editing any of those four stored columns is detectable.
 *
 * @module outcomes/outcome-record
 */

import type { HashedOutcomeFields, OutcomeRecord, RecordOutcomeInput } from '../types/outcome.js';
import { canonicalJson, sha256Hex } from '../utils/hash.js';
import { preciseNow, systemClock, type Clock } from '../utils/time.js';
import { parseOrThrow, recordOutcomeSchema } from './schema.js';

/**
 * SHA-256 of the canonical JSON of the hashed fields
 */
export function computeOutcomeHash(fields: HashedOutcomeFields): string {
  return sha256Hex(
    canonicalJson({
      decision_hash: fields.decisionHash,
      mrn: fields.mrn,
      actual_outcome: fields.actualOutcome,
      recorded_at: fields.recordedAt,
    })
  );
}

/**
 * Validate input and build a frozen record. `recordedAt` is stored with
 * six fractional digits and falls back to the clock when omitted.
 *
 * @throws {OutcomeValidationError} When the input fails validation
 */
export function createOutcomeRecord(
  input: RecordOutcomeInput,
  clock: Clock = systemClock
): OutcomeRecord {
  const parsed = parseOrThrow(recordOutcomeSchema, input, 'Invalid outcome');
  const recordedAt = parsed.recordedAt ?? preciseNow(clock);

  const outcomeHash = computeOutcomeHash({
    decisionHash: parsed.decisionHash,
    mrn: parsed.mrn,
    actualOutcome: parsed.actualOutcome,
    recordedAt,
  });

  return Object.freeze({
    decisionHash: parsed.decisionHash,
    mrn: parsed.mrn,
    predictedProbSafe: parsed.predictedProbSafe,
    predictedRiskCategory: parsed.predictedRiskCategory,
    actualOutcome: parsed.actualOutcome,
    outcomeDetails: parsed.outcomeDetails,
    daysToOutcome: parsed.daysToOutcome,
    outcomeSeverity: parsed.outcomeSeverity,
    recordedBy: parsed.recordedBy,
    recordedAt,
    metadata: Object.freeze({ ...(parsed.metadata ?? {}) }),
    outcomeHash,
  });
}

/**
 * Recompute a record's hash and compare it with the stored one
 */
export function verifyOutcomeRecord(record: OutcomeRecord): boolean {
  return computeOutcomeHash(record) === record.outcomeHash;
}
