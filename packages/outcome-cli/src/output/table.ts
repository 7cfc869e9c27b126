/**
 * Table primitives for terminal output: aligned field lists, column
 * tables and titled sections.
 */

import chalk from 'chalk';

export type Cell = string | number | boolean | null;

export type Field = readonly [label: string, value: Cell];

export interface Column<T> {
  header: string;
  value: (row: T) => Cell;
}

export function cellText(value: Cell): string {
  return value === null ? '—' : String(value);
}

export function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

/**
 * One "label  value" line per field, labels padded to the longest
 */
export function renderFields(fields: readonly Field[]): string {
  const width = Math.max(0, ...fields.map(([label]) => label.length));
  return fields
    .map(([label, value]) => `${chalk.bold(label.padEnd(width))}  ${cellText(value)}\n`)
    .join('');
}

/**
 * Column table with a bold header and a rule under it
 */
export function renderRows<T>(
  rows: readonly T[],
  columns: readonly Column<T>[],
  emptyMessage = 'No results.',
): string {
  if (rows.length === 0) return `${emptyMessage}\n`;

  const cells = rows.map((row) => columns.map((column) => cellText(column.value(row))));
  const widths = columns.map((column, i) =>
    Math.max(column.header.length, ...cells.map((line) => line[i]?.length ?? 0)),
  );
  const pad = (values: readonly string[]): string =>
    values.map((value, i) => value.padEnd(widths[i] ?? 0)).join('  ').trimEnd();

  return [
    chalk.bold(pad(columns.map((column) => column.header))),
    widths.map((w) => '─'.repeat(w)).join('  '),
    ...cells.map(pad),
  ].join('\n') + '\n';
}

export function renderSection(title: string, body: string): string {
  return `${chalk.bold.underline(title)}\n${body}`;
}
