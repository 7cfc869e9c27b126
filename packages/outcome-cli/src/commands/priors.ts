/**
 * outcome-loop priors | posterior | prior-history: inspect the Beta prior.
 */

import type { Command } from 'commander';

import {
  parseInteger,
  runWithPipeline,
  withCommonOptions,
  type CommonOptions,
} from '../pipeline.js';
import { posteriorView, priorHistoryView, priorView } from '../output/index.js';

export function registerPriorCommands(program: Command): void {
  withCommonOptions(
    program
      .command('priors')
      .description('Show the current Beta prior with its 95% credible interval'),
  ).action(async (opts: CommonOptions) => {
    await runWithPipeline(opts, (pipeline) => pipeline.getCurrentPriors(), priorView);
  });

  withCommonOptions(
    program
      .command('posterior <nSafe> <nAdverse>')
      .description('Show the posterior after hypothetical safe and adverse observations'),
  ).action(async (nSafe: string, nAdverse: string, opts: CommonOptions) => {
    await runWithPipeline(
      opts,
      (pipeline) => pipeline.getPosteriorProbability(parseInteger(nSafe), parseInteger(nAdverse)),
      posteriorView,
    );
  });

  withCommonOptions(
    program
      .command('prior-history')
      .description('List prior updates, newest first')
      .option('-l, --limit <n>', 'Maximum entries', parseInteger, 100),
  ).action(async (opts: CommonOptions & { limit: number }) => {
    await runWithPipeline(opts, (pipeline) => pipeline.getPriorHistory(opts.limit), priorHistoryView);
  });
}
