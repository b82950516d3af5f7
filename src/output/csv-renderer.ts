/**
 * Renders statements and fact tables as CSV for spreadsheet import.
 * Numbers are written raw; missing cells are empty.
 */

import type { LineItem, LineItemValue, StitchedStatement } from '../core/types.js';
import type { FactTable } from '../processing/fact-query.js';
import type { PeriodColumn } from './table-renderer.js';
import { csvEscape } from './format-utils.js';

function csvCell(value: LineItemValue | null | undefined): string {
  if (value === null || value === undefined) return '';
  return csvEscape(String(value));
}

export function renderStatementCsv(items: LineItem[], columns: PeriodColumn[]): string {
  const lines: string[] = [];
  lines.push(['Concept', 'Label', 'Level', ...columns.map(c => csvEscape(c.label))].join(','));

  for (const item of items) {
    lines.push([
      csvEscape(item.concept),
      csvEscape(item.label),
      String(item.level),
      ...columns.map(c => csvCell(item.values[c.key])),
    ].join(','));
  }

  return lines.join('\n');
}

export function renderStitchedCsv(stitched: StitchedStatement): string {
  const lines: string[] = [];
  lines.push(['Label', 'Concept', 'Level', ...stitched.periods.map(p => csvEscape(p.label))].join(','));

  for (const row of stitched.statement_data) {
    lines.push([
      csvEscape(row.label),
      csvEscape(row.concept),
      String(row.level),
      ...stitched.periods.map(p => csvCell(row.values[p.key])),
    ].join(','));
  }

  return lines.join('\n');
}

export function renderFactTableCsv(table: FactTable): string {
  const lines = [table.columns.map(csvEscape).join(',')];
  for (const row of table.rows) {
    lines.push(table.columns.map(col => csvCell(row[col])).join(','));
  }
  return lines.join('\n');
}
