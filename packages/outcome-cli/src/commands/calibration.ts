/**
 * outcome-loop calibration | snapshot | calibration-history
 */

import type { Command } from 'commander';

import {
  parseInteger,
  runWithPipeline,
  withCommonOptions,
  type CommonOptions,
} from '../pipeline.js';
import { calibrationHistoryView, calibrationView } from '../output/index.js';

export function registerCalibrationCommands(program: Command): void {
  withCommonOptions(
    program
      .command('calibration')
      .description('Show ECE, MCE and per-bucket calibration'),
  ).action(async (opts: CommonOptions) => {
    await runWithPipeline(opts, (pipeline) => pipeline.getCalibrationReport(), calibrationView);
  });

  withCommonOptions(
    program
      .command('snapshot')
      .description('Take and persist a calibration snapshot'),
  ).action(async (opts: CommonOptions) => {
    await runWithPipeline(opts, (pipeline) => pipeline.takeCalibrationSnapshot(), calibrationView);
  });

  withCommonOptions(
    program
      .command('calibration-history')
      .description('List calibration snapshots, newest first')
      .option('-l, --limit <n>', 'Maximum snapshots', parseInteger, 30),
  ).action(async (opts: CommonOptions & { limit: number }) => {
    await runWithPipeline(
      opts,
      (pipeline) => pipeline.getCalibrationHistory(opts.limit),
      calibrationHistoryView,
    );
  });
}
