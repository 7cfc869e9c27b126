/**
 * Pipeline bridge for CLI commands.
 */

import chalk from 'chalk';
import { InvalidArgumentError, Option, type Command } from 'commander';
import {
  createLearningPipeline,
  createLogger,
  loadConfig,
  type LearningPipeline,
} from '@outcome-loop/learning';

import { OUTPUT_FORMATS, formatOutput, type OutputFormat, type TableView } from './output/index.js';

export interface CommonOptions {
  db?: string;
  format: OutputFormat;
}

/**
 * Add the options every pipeline command takes
 */
export function withCommonOptions(command: Command): Command {
  return command
    .option('--db <path>', 'Outcome database path (overrides configuration)')
    .addOption(
      new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS).default('table'),
    );
}

/**
 * Open a pipeline from .outcome-loop/config.json in the working
 * directory. Logs go to stderr so stdout stays parseable.
 */
export async function openPipeline(opts: Pick<CommonOptions, 'db'>): Promise<LearningPipeline> {
  const config = await loadConfig(process.cwd());
  const logger = createLogger({
    level: config.logLevel,
    sink: (_level, line) => {
      process.stderr.write(`${line}\n`);
    },
  });
  return createLearningPipeline(
    { ...config, ...(opts.db !== undefined && { dbPath: opts.db }) },
    { logger },
  );
}

/**
 * Run fn against an open pipeline, print its result through view (or as
 * JSON), and close the pipeline afterwards. Errors are printed and set
 * exit code 1.
 */
export async function runWithPipeline<T>(
  opts: CommonOptions,
  fn: (pipeline: LearningPipeline) => T | undefined,
  view: TableView<T>,
): Promise<void> {
  let pipeline: LearningPipeline | undefined;
  try {
    pipeline = await openPipeline(opts);
    const result = fn(pipeline);
    if (result !== undefined) {
      process.stdout.write(formatOutput(result, opts.format, view));
    }
  } catch (err) {
    reportError(err);
  } finally {
    pipeline?.close();
  }
}

export function reportError(err: unknown): void {
  process.stderr.write(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`) + '\n');
  process.exitCode = 1;
}

// ============================================================================
// Argument parsers
// ============================================================================

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}
