/**
 * Error Classes
 *
 * Integrity mismatches and missing outcomes are reported as data,
 * not thrown. Storage I/O errors propagate unchanged.
 *
 * @module errors
 */

/**
 * Error thrown when caller input fails validation
 */
export class OutcomeValidationError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'OutcomeValidationError';
    this.issues = issues;
  }
}

/**
 * Error thrown when an outcome for the same decision and timestamp
 * already exists. Nothing is written when this is raised.
 */
export class DuplicateOutcomeError extends Error {
  public readonly decisionHash: string;
  public readonly recordedAt: string;
  public readonly errorCause: Error | undefined;

  constructor(decisionHash: string, recordedAt: string, errorCause?: Error | undefined) {
    super(`Outcome already recorded for decision ${decisionHash} at ${recordedAt}`);
    this.name = 'DuplicateOutcomeError';
    this.decisionHash = decisionHash;
    this.recordedAt = recordedAt;
    this.errorCause = errorCause;
  }
}

/**
 * Error thrown when the persisted learning state was changed by another
 * writer since this process loaded it. Call `reload()` and retry.
 */
export class StaleLearningStateError extends Error {
  public readonly expectedVersion: number;

  constructor(expectedVersion: number) {
    super(`Learning state changed by another writer (expected version ${expectedVersion})`);
    this.name = 'StaleLearningStateError';
    this.expectedVersion = expectedVersion;
  }
}
