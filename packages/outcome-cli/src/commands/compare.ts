/**
 * outcome-loop compare: score a decision's latest outcome against its prediction.
 */

import type { Command } from 'commander';

import { comparisonView } from '../output/index.js';
import { runWithPipeline, withCommonOptions, type CommonOptions } from '../pipeline.js';

export function registerCompareCommand(program: Command): void {
  withCommonOptions(
    program
      .command('compare <decisionHash>')
      .description('Compare the predicted safety probability with the recorded outcome'),
  ).action(async (decisionHash: string, opts: CommonOptions) => {
    await runWithPipeline(
      opts,
      (pipeline) => {
        const comparison = pipeline.comparePredictionOutcome(decisionHash);
        if (!comparison) {
          process.stderr.write(`No outcome recorded for decision ${decisionHash}\n`);
          process.exitCode = 1;
          return undefined;
        }
        return comparison;
      },
      comparisonView,
    );
  });
}
