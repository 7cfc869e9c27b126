/**
 * outcome-loop report | patient | export
 */

import { InvalidArgumentError, type Command } from 'commander';
import { REPORT_TYPES, type ReportType } from '@outcome-loop/learning';

import {
  parseInteger,
  runWithPipeline,
  withCommonOptions,
  type CommonOptions,
} from '../pipeline.js';
import { exportView, learningReportView, patientOutcomesView, type ExportSummary } from '../output/index.js';

function parseReportType(value: string): ReportType {
  const match = REPORT_TYPES.find((type) => type === value);
  if (!match) {
    throw new InvalidArgumentError(`Report type must be one of: ${REPORT_TYPES.join(', ')}`);
  }
  return match;
}

export function registerReportCommands(program: Command): void {
  withCommonOptions(
    program
      .command('report [type]')
      .description(`Generate and store a learning report (${REPORT_TYPES.join(', ')})`),
  ).action(async (type: string | undefined, opts: CommonOptions) => {
    await runWithPipeline(
      opts,
      (pipeline) => pipeline.generateLearningReport(parseReportType(type ?? 'comprehensive')),
      learningReportView,
    );
  });

  withCommonOptions(
    program
      .command('patient <mrn>')
      .description("List a patient's outcomes, newest first")
      .option('-l, --limit <n>', 'Maximum outcomes', parseInteger, 50),
  ).action(async (mrn: string, opts: CommonOptions & { limit: number }) => {
    await runWithPipeline(opts, (pipeline) => pipeline.getPatientOutcomes(mrn, opts.limit), patientOutcomesView);
  });

  withCommonOptions(
    program
      .command('export [path]')
      .description('Export all outcomes with calibration and priors as JSON'),
  ).action(async (outputPath: string | undefined, opts: CommonOptions) => {
    await runWithPipeline(
      opts,
      (pipeline): ExportSummary => {
        const exportPath = outputPath ?? pipeline.config.exportPath;
        const data = pipeline.exportOutcomes(exportPath);
        return { path: exportPath, exportTimestamp: data.exportTimestamp, totalOutcomes: data.totalOutcomes };
      },
      exportView,
    );
  });
}
