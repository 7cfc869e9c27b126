/**
 * Output formats: a per-result table view, or JSON.
 */

import { formatJson } from './json.js';
import type { TableView } from './views.js';

export const OUTPUT_FORMATS = ['table', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function formatOutput<T>(data: T, format: OutputFormat, view: TableView<T>): string {
  return format === 'json' ? formatJson(data) : view(data);
}

export * from './views.js';
export { formatJson } from './json.js';
