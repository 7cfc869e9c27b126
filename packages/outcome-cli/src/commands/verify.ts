/**
 * outcome-loop verify: recompute every stored outcome hash.
 *
 * Exit codes: 0 = intact, 1 = error, 2 = integrity failures found.
 */

import type { Command } from 'commander';

import { integrityView } from '../output/index.js';
import { runWithPipeline, withCommonOptions, type CommonOptions } from '../pipeline.js';

export function registerVerifyCommand(program: Command): void {
  withCommonOptions(
    program
      .command('verify')
      .description('Verify the integrity hash of every stored outcome'),
  ).action(async (opts: CommonOptions) => {
    await runWithPipeline(
      opts,
      (pipeline) => {
        const result = pipeline.verifyOutcomeIntegrity();
        if (!result.valid) {
          process.exitCode = 2;
        }
        return result;
      },
      integrityView,
    );
  });
}
