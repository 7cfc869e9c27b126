/**
 * Input schemas for outcome capture
 *
 * @module outcomes/schema
 */

import { z } from 'zod';

import { OutcomeValidationError } from '../errors.js';
import { OUTCOME_TYPES } from '../types/outcome.js';
import { normalizeTimestamp, TIMESTAMP_FRACTION_DIGITS } from '../utils/time.js';

const recordedAtSchema = z
  .string()
  .datetime()
  .transform((value, ctx) => {
    const normalized = normalizeTimestamp(value);
    if (normalized === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected at most ${TIMESTAMP_FRACTION_DIGITS} fractional second digits`,
      });
      return z.NEVER;
    }
    return normalized;
  });

export const recordOutcomeSchema = z.object({
  decisionHash: z.string().min(1),
  mrn: z.string().min(1),
  predictedProbSafe: z.number().finite().min(0).max(1),
  predictedRiskCategory: z.string(),
  actualOutcome: z.enum(OUTCOME_TYPES),
  outcomeDetails: z.string(),
  daysToOutcome: z.number().int().nonnegative(),
  outcomeSeverity: z.number().int().min(1).max(5),
  recordedBy: z.string().min(1),
  recordedAt: recordedAtSchema.optional(),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

export type ParsedOutcomeInput = z.infer<typeof recordOutcomeSchema>;

/**
 * Flatten zod issues into "path: message" strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Parse a value against a schema, raising OutcomeValidationError on failure
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  message: string
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new OutcomeValidationError(message, formatIssues(result.error));
  }
  return result.data;
}
