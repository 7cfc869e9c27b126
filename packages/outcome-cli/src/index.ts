/**
 * @outcome-loop/cli: command line front end for the learning pipeline.
 */

import { Command } from 'commander';

import {
  registerCalibrationCommands,
  registerCompareCommand,
  registerPriorCommands,
  registerRecordCommand,
  registerReportCommands,
  registerVerifyCommand,
} from './commands/index.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('outcome-loop')
    .description('Record clinical outcomes and track prediction calibration')
    .version(VERSION);

  registerRecordCommand(program);
  registerCompareCommand(program);
  registerPriorCommands(program);
  registerCalibrationCommands(program);
  registerReportCommands(program);
  registerVerifyCommand(program);

  return program;
}

export { formatOutput, formatJson, type OutputFormat, type TableView } from './output/index.js';
