/**
 * outcome-loop record: capture the outcome of a recommendation.
 */

import { InvalidArgumentError, Option, type Command } from 'commander';
import { OUTCOME_TYPES, type OutcomeMetadata, type OutcomeType } from '@outcome-loop/learning';

import { recordView } from '../output/index.js';
import { parseInteger, parseNumber, runWithPipeline, withCommonOptions, type CommonOptions } from '../pipeline.js';

interface RecordOptions extends CommonOptions {
  decision: string;
  mrn: string;
  prob: number;
  category: string;
  outcome: OutcomeType;
  details: string;
  days: number;
  severity: number;
  by: string;
  at?: string;
  metadata?: OutcomeMetadata;
}

function parseMetadata(value: string): OutcomeMetadata {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new InvalidArgumentError('Metadata must be valid JSON.');
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new InvalidArgumentError('Metadata must be a JSON object.');
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function registerRecordCommand(program: Command): void {
  withCommonOptions(
    program
      .command('record')
      .description('Record the actual outcome of a prediction and update the prior')
      .requiredOption('--decision <hash>', 'Decision hash of the original prediction')
      .requiredOption('--mrn <mrn>', 'Patient identifier')
      .requiredOption('--prob <p>', 'Predicted probability that the intervention is safe', parseNumber)
      .addOption(
        new Option('--outcome <outcome>', 'What actually happened').choices(OUTCOME_TYPES).makeOptionMandatory(),
      )
      .requiredOption('--by <who>', 'Who recorded the outcome')
      .option('--category <category>', 'Predicted risk category', '')
      .option('--details <text>', 'Outcome details', '')
      .option('--days <n>', 'Days from recommendation to outcome', parseInteger, 0)
      .option('--severity <n>', 'Severity 1 (mild) - 5 (severe)', parseInteger, 1)
      .option('--at <timestamp>', 'UTC ISO timestamp of the outcome (default: now)')
      .option('--metadata <json>', 'JSON object of extra metadata', parseMetadata),
  ).action(async (opts: RecordOptions) => {
    await runWithPipeline(
      opts,
      (pipeline) =>
        pipeline.recordOutcome({
          decisionHash: opts.decision,
          mrn: opts.mrn,
          predictedProbSafe: opts.prob,
          predictedRiskCategory: opts.category,
          actualOutcome: opts.outcome,
          outcomeDetails: opts.details,
          daysToOutcome: opts.days,
          outcomeSeverity: opts.severity,
          recordedBy: opts.by,
          ...(opts.at !== undefined && { recordedAt: opts.at }),
          ...(opts.metadata !== undefined && { metadata: opts.metadata }),
        }),
      recordView,
    );
  });
}
