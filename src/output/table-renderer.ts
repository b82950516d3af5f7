import chalk from 'chalk';
import type {
  EntityInfo,
  LineItem,
  LineItemValue,
  PeriodView,
  ReportingPeriod,
  StatementInfo,
  StitchedStatement,
} from '../core/types.js';
import type { FactTable } from '../processing/fact-query.js';
import { formatValue, padLeft, padRight, visibleLength } from './format-utils.js';

/**
 * Renders statements, period views and fact tables as terminal tables.
 * Labels are indented two spaces per presentation level.
 */

export interface PeriodColumn {
  key: string;
  label: string;
}

interface GridRow {
  label: string;
  level: number;
  bold: boolean;
  cells: string[];
}

const INDENT = 2;
const MIN_VALUE_WIDTH = 14;

/** Columns for the periods that actually carry values, in reporting order (newest first) */
export function periodColumns(items: LineItem[], periods: ReportingPeriod[]): PeriodColumn[] {
  const used = new Set<string>();
  for (const item of items) {
    for (const key of Object.keys(item.values)) used.add(key);
  }
  return periods.filter(p => used.has(p.key)).map(p => ({ key: p.key, label: p.label }));
}

function renderGrid(title: string, columns: string[], rows: GridRow[]): string {
  const lines: string[] = [];
  lines.push(chalk.bold(title));
  lines.push(chalk.dim('='.repeat(title.length)));
  lines.push('');

  if (rows.length === 0) {
    lines.push(chalk.dim('  No line items.'));
    return lines.join('\n');
  }

  const labelWidth = Math.max(...rows.map(r => r.level * INDENT + r.label.length), 'Line Item'.length) + 2;
  const widths = columns.map((col, i) =>
    Math.max(col.length, MIN_VALUE_WIDTH, ...rows.map(r => visibleLength(r.cells[i] ?? ''))) + 2
  );

  const header = columns.map((col, i) => chalk.underline(padLeft(col, widths[i]))).join('');
  lines.push(`  ${chalk.underline(padRight('Line Item', labelWidth))}${header}`);

  for (const row of rows) {
    const indented = ' '.repeat(row.level * INDENT) + row.label;
    const label = row.bold ? chalk.bold(indented) : indented;
    const cells = row.cells.map((cell, i) => padLeft(cell, widths[i])).join('');
    lines.push(`  ${padRight(label, labelWidth)}${cells}`);
  }

  return lines.join('\n');
}

function cell(value: LineItemValue | undefined, decimals: number | undefined): string {
  return value === undefined ? '--' : formatValue(value, decimals);
}

// ── Statements ─────────────────────────────────────────────────────────

export function renderStatement(title: string, items: LineItem[], columns: PeriodColumn[]): string {
  const rows: GridRow[] = items.map(item => ({
    label: item.label,
    level: item.level,
    bold: item.is_abstract || item.is_total === true,
    cells: item.is_abstract && !item.has_values
      ? columns.map(() => '')
      : columns.map(c => cell(item.values[c.key], item.decimals[c.key])),
  }));
  return renderGrid(title, columns.map(c => c.label), rows);
}

export function renderStitched(title: string, stitched: StitchedStatement): string {
  const rows: GridRow[] = stitched.statement_data.map(row => ({
    label: row.label,
    level: row.level,
    bold: row.is_abstract || row.is_total,
    cells: row.is_abstract && !row.has_values
      ? stitched.periods.map(() => '')
      : stitched.periods.map(p => cell(row.values[p.key], row.decimals[p.key])),
  }));
  return renderGrid(title, stitched.periods.map(p => p.label), rows);
}

// ── Listings ───────────────────────────────────────────────────────────

export function renderStatementList(statements: StatementInfo[]): string {
  if (statements.length === 0) return chalk.dim('No statements found.');

  const lines: string[] = [];
  const typeWidth = Math.max(...statements.map(s => (s.type ?? '--').length), 'Type'.length) + 2;
  const nameWidth = Math.max(...statements.map(s => s.role_name.length), 'Role'.length) + 2;
  lines.push(`  ${chalk.underline(padRight('Type', typeWidth))}${chalk.underline(padRight('Role', nameWidth))}${chalk.underline('Definition')}`);

  for (const s of statements) {
    const type = s.type ? chalk.cyan(s.type) : chalk.dim('--');
    lines.push(`  ${padRight(type, typeWidth)}${padRight(s.role_name, nameWidth)}${s.definition}`);
  }
  return lines.join('\n');
}

export function renderPeriodViews(views: PeriodView[], periods: ReportingPeriod[]): string {
  if (views.length === 0) return chalk.dim('No period views available.');

  const labels = new Map(periods.map(p => [p.key, p.label] as const));
  const lines: string[] = [];
  for (const view of views) {
    lines.push(chalk.bold(view.name) + chalk.dim(`  ${view.description}`));
    for (const key of view.period_keys) {
      lines.push(`  ${padRight(labels.get(key) ?? key, 40)}${chalk.dim(key)}`);
    }
    lines.push('');
  }
  return lines.join('\n').trimEnd();
}

export function renderEntityInfo(entity: EntityInfo): string {
  const fields: Array<[string, string | number | boolean | null]> = [
    ['Entity', entity.entity_name],
    ['Ticker', entity.ticker],
    ['CIK', entity.identifier],
    ['Document type', entity.document_type],
    ['Fiscal year', entity.fiscal_year],
    ['Fiscal period', entity.fiscal_period],
    ['Period end', entity.document_period_end_date],
    ['Reporting end', entity.reporting_end_date],
    ['Fiscal year end', entity.fiscal_year_end_month !== null && entity.fiscal_year_end_day !== null
      ? `--${String(entity.fiscal_year_end_month).padStart(2, '0')}-${String(entity.fiscal_year_end_day).padStart(2, '0')}`
      : null],
    ['Annual report', entity.annual_report],
    ['Quarterly report', entity.quarterly_report],
    ['Amendment', entity.amendment],
  ];

  return fields
    .map(([name, value]) => `  ${padRight(chalk.dim(name), 18)}${value === null ? chalk.dim('--') : String(value)}`)
    .join('\n');
}

export function renderFactTable(table: FactTable): string {
  if (table.rows.length === 0) return chalk.dim('No matching facts.');

  const widths = table.columns.map(col =>
    Math.max(col.length, ...table.rows.map(r => String(r[col] ?? '').length)) + 2
  );
  const lines: string[] = [];
  lines.push('  ' + table.columns.map((col, i) => chalk.underline(padRight(col, widths[i]))).join(''));
  for (const row of table.rows) {
    lines.push('  ' + table.columns.map((col, i) => padRight(String(row[col] ?? ''), widths[i])).join(''));
  }
  return lines.join('\n');
}
