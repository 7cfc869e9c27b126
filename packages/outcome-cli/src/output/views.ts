/**
 * Table views for each command's result type.
 */

import chalk from 'chalk';
import type {
  CalibrationBucketDetail,
  CalibrationReport,
  CalibrationSnapshot,
  IntegrityReport,
  LearningReport,
  OutcomeRecord,
  PatientOutcome,
  PosteriorEstimate,
  PredictionComparison,
  PriorHistoryEntry,
  PriorSummary,
} from '@outcome-loop/learning';

import { formatPercent, renderFields, renderRows, renderSection, type Column, type Field } from './table.js';

export type TableView<T> = (data: T) => string;

export interface ExportSummary {
  path: string;
  exportTimestamp: string;
  totalOutcomes: number;
}

const BUCKET_COLUMNS: readonly Column<CalibrationBucketDetail>[] = [
  { header: 'Range', value: (b) => b.range },
  { header: 'Predictions', value: (b) => b.nPredictions },
  { header: 'Safe', value: (b) => b.nSafeOutcomes },
  { header: 'Observed', value: (b) => formatPercent(b.observedSafeRate) },
  { header: 'Expected', value: (b) => formatPercent(b.expectedSafeRate) },
  { header: 'Error', value: (b) => b.calibrationError },
];

function priorFields(prior: PriorSummary): Field[] {
  return [
    ['Prior', `Beta(${prior.alpha}, ${prior.beta})`],
    ['Mean', prior.priorMean],
    ['Variance', prior.priorVariance],
    ['95% CI', `${prior.ciLow} - ${prior.ciHigh}`],
    ['Updates', prior.nUpdates],
  ];
}

export const recordView: TableView<OutcomeRecord> = (record) =>
  renderFields([
    ['Decision', record.decisionHash],
    ['MRN', record.mrn],
    ['Predicted safe', formatPercent(record.predictedProbSafe)],
    ['Outcome', record.actualOutcome],
    ['Severity', record.outcomeSeverity],
    ['Recorded at', record.recordedAt],
    ['Hash', record.outcomeHash],
  ]);

export const comparisonView: TableView<PredictionComparison> = (comparison) =>
  renderFields([
    ['Decision', comparison.decisionHash],
    ['Predicted safe', formatPercent(comparison.predictedProbSafe)],
    ['Outcome', comparison.actualOutcome],
    ['Error', comparison.predictionError],
    ['Correct', comparison.predictionCorrect ? chalk.green('yes') : chalk.red('no')],
    ['Brier', comparison.brierScore],
    ['Recorded at', comparison.recordedAt],
  ]);

export const priorView: TableView<PriorSummary> = (prior) => renderFields(priorFields(prior));

export const posteriorView: TableView<PosteriorEstimate> = (posterior) =>
  renderFields([
    ['Posterior', `Beta(${posterior.posteriorAlpha}, ${posterior.posteriorBeta})`],
    ['P(safe)', posterior.probSafe],
    ['95% CI', `${posterior.ciLow} - ${posterior.ciHigh}`],
  ]);

export const priorHistoryView: TableView<PriorHistoryEntry[]> = (entries) =>
  renderRows(
    entries,
    [
      { header: 'Updated', value: (e) => e.updatedAt },
      { header: 'Alpha', value: (e) => `${e.oldAlpha} -> ${e.newAlpha}` },
      { header: 'Beta', value: (e) => `${e.oldBeta} -> ${e.newBeta}` },
      { header: 'Mean', value: (e) => `${e.oldMean} -> ${e.newMean}` },
    ],
    'No prior updates.',
  );

export const calibrationView: TableView<CalibrationReport> = (report) =>
  renderFields([
    ['ECE', report.ece],
    ['MCE', report.mce],
    ['Predictions', report.totalPredictions],
    ['Safe outcomes', report.totalSafeOutcomes],
  ]) +
  '\n' +
  renderRows(report.buckets, BUCKET_COLUMNS, 'No calibrated predictions.');

export const calibrationHistoryView: TableView<CalibrationSnapshot[]> = (snapshots) =>
  renderRows(
    snapshots,
    [
      { header: 'Snapshot', value: (s) => s.snapshotAt },
      { header: 'ECE', value: (s) => s.ece },
      { header: 'MCE', value: (s) => s.mce },
      { header: 'Predictions', value: (s) => s.totalPredictions },
    ],
    'No calibration snapshots.',
  );

export const learningReportView: TableView<LearningReport> = (report) => {
  const distribution = report.outcomeDistribution;
  const performance = report.modelPerformance;
  const sections = [
    renderSection(
      `Learning report (${report.reportType})`,
      renderFields([
        ['Generated', report.generatedAt],
        ['Outcomes', report.totalOutcomes],
        ['Evaluated', report.evaluatedOutcomes],
        ['Safe / adverse / unknown', `${distribution.safe} / ${distribution.adverse} / ${distribution.unknown}`],
      ]),
    ),
    renderSection(
      'Model performance',
      renderFields([
        ['Brier', performance.brierScore],
        ['Accuracy', formatPercent(performance.accuracy)],
        ['Correct', `${performance.nCorrect} of ${performance.nEvaluated}`],
      ]),
    ),
    renderSection('Calibration', calibrationView(report.calibration)),
    renderSection('Current prior', priorView(report.currentPriors)),
  ];

  if (report.severityAnalysis) {
    const severity = report.severityAnalysis;
    sections.push(
      renderSection(
        'Adverse severity',
        renderFields([
          ['Average', severity.avgAdverseSeverity],
          ['Range', `${severity.minAdverseSeverity} - ${severity.maxAdverseSeverity}`],
        ]),
      ),
    );
  }
  if (report.dailyStats) {
    sections.push(
      renderSection(
        'Daily outcomes',
        renderRows(report.dailyStats, [
          { header: 'Date', value: (d) => d.date },
          { header: 'Count', value: (d) => d.count },
          { header: 'Safe', value: (d) => d.safeCount },
          { header: 'Adverse', value: (d) => d.adverseCount },
          { header: 'Avg prediction', value: (d) => d.avgPrediction },
        ]),
      ),
    );
  }
  if (report.riskCategoryPerformance) {
    sections.push(
      renderSection(
        'Risk categories',
        renderRows(report.riskCategoryPerformance, [
          { header: 'Category', value: (c) => c.category || '(none)' },
          { header: 'Count', value: (c) => c.count },
          { header: 'Observed safe', value: (c) => formatPercent(c.observedSafeRate) },
          { header: 'Accuracy', value: (c) => formatPercent(c.accuracy) },
        ]),
      ),
    );
  }
  return sections.join('\n');
};

export const patientOutcomesView: TableView<PatientOutcome[]> = (outcomes) =>
  renderRows(
    outcomes,
    [
      { header: 'Recorded', value: (o) => o.recordedAt },
      { header: 'Decision', value: (o) => o.decisionHash },
      { header: 'Predicted', value: (o) => formatPercent(o.predictedProbSafe) },
      { header: 'Outcome', value: (o) => o.actualOutcome },
      { header: 'Severity', value: (o) => o.outcomeSeverity },
    ],
    'No outcomes for this patient.',
  );

export const exportView: TableView<ExportSummary> = (summary) =>
  renderFields([
    ['Exported', summary.totalOutcomes],
    ['Path', summary.path],
    ['At', summary.exportTimestamp],
  ]);

export const integrityView: TableView<IntegrityReport> = (report) => {
  const status = report.valid ? chalk.green('intact') : chalk.red('tampered');
  const summary = renderFields([
    ['Status', status],
    ['Outcomes', report.totalOutcomes],
    ['Valid', report.validOutcomes],
    ['Verified at', report.verifiedAt],
  ]);
  if (report.invalidIds.length === 0) return summary;
  return `${summary}\nInvalid outcome ids: ${report.invalidIds.join(', ')}\n`;
};
