import type {
  LineItem,
  LineItemValue,
  StatementExtraction,
  StatementType,
  StitchedRow,
  StitchedStatement,
} from '../core/types.js';
import { daysBetween, formatShortDate, parseDate } from '../core/dates.js';
import { debug } from '../core/logger.js';
import { ConceptMapper, getDefaultConceptMapper, standardizeStatement } from './standardization.js';

/**
 * Statement stitching: merges one statement type from several filings into a
 * single multi-period statement.
 *
 * 1. Union the period keys of every filing (most recent filing's label wins)
 * 2. Select periods by policy
 * 3. Standardize each filing's line items (optional)
 * 4. Merge rows by label; first filing to mention a row fixes its metadata
 * 5. Order rows by (level, label), or keep first-seen order
 */

export const PeriodType = {
  RECENT_PERIODS: 'Most Recent Periods',
  RECENT_YEARS: 'Recent Years',
  THREE_YEAR_COMPARISON: 'Three-Year Comparison',
  THREE_QUARTERS: 'Three Recent Quarters',
  ANNUAL_COMPARISON: 'Annual Comparison',
  QUARTERLY_TREND: 'Quarterly Trend',
  ALL_PERIODS: 'All Available Periods',
} as const;

export type PeriodTypeKey = keyof typeof PeriodType;
export type PeriodTypeValue = typeof PeriodType[PeriodTypeKey];

const isPeriodTypeKey = (value: string): value is PeriodTypeKey => Object.hasOwn(PeriodType, value);

/** Accepts the key (`ANNUAL_COMPARISON`) or its display name (`Annual Comparison`); unknown -> RECENT_PERIODS */
export function resolvePeriodType(policy: string): PeriodTypeKey {
  if (isPeriodTypeKey(policy)) return policy;
  for (const [key, value] of Object.entries(PeriodType)) {
    if (value === policy && isPeriodTypeKey(key)) return key;
  }
  return 'RECENT_PERIODS';
}

const BRACKETED = ['[Axis]', '[Domain]', '[Member]', '[Line Items]', '[Table]', '[Abstract]'];

export interface StitchOptions {
  /** `label` merges rows sharing a display label; `concept` also requires the same concept */
  keyBy?: 'label' | 'concept';
  /** `level` sorts by (level, label); `presentation` keeps first-seen order */
  order?: 'level' | 'presentation';
}

export interface StatementSource {
  getStatementByType(type: StatementType): StatementExtraction | null;
}

// ── Periods ────────────────────────────────────────────────────────────

export interface StitchPeriod {
  key: string;
  label: string;
  kind: 'instant' | 'duration';
  end: Date;
  days: number | null;
}

/** `instant_2024-12-31` or `duration_2024-01-01_2024-12-31`; null when the key is malformed */
export function parsePeriodKey(key: string): Omit<StitchPeriod, 'label'> | null {
  const parts = key.split('_');
  if (parts[0] === 'instant' && parts.length === 2) {
    const end = parseDate(parts[1]);
    return end ? { key, kind: 'instant', end, days: null } : null;
  }
  if (parts[0] === 'duration' && parts.length === 3) {
    const start = parseDate(parts[1]);
    const end = parseDate(parts[2]);
    return start && end ? { key, kind: 'duration', end, days: daysBetween(start, end) } : null;
  }
  return null;
}

const within = (days: number | null, min: number, max: number): boolean => days !== null && days >= min && days <= max;

export function selectPeriods(all: StitchPeriod[], policy: PeriodTypeKey, maxPeriods: number): StitchPeriod[] {
  const durations = all.filter(p => p.kind === 'duration');

  switch (policy) {
    case 'THREE_YEAR_COMPARISON': {
      const years = new Set<number>();
      const picked: StitchPeriod[] = [];
      for (const p of all) {
        if (p.kind !== 'instant' || years.has(p.end.getUTCFullYear())) continue;
        years.add(p.end.getUTCFullYear());
        picked.push(p);
      }
      return picked.slice(0, maxPeriods);
    }
    case 'THREE_QUARTERS':
    case 'QUARTERLY_TREND':
      return durations.filter(p => within(p.days, 85, 95)).slice(0, maxPeriods);
    case 'ANNUAL_COMPARISON':
    case 'RECENT_YEARS':
      return durations.filter(p => within(p.days, 350, 380)).slice(0, maxPeriods);
    case 'ALL_PERIODS':
    case 'RECENT_PERIODS':
      return all.slice(0, maxPeriods);
  }
}

// ── Stitcher ───────────────────────────────────────────────────────────

interface RowState {
  label: string;
  concept: string;
  level: number;
  is_abstract: boolean;
  is_total: boolean;
  values: Record<string, LineItemValue>;
  decimals: Record<string, number>;
}

export class StatementStitcher {
  constructor(private readonly mapper: ConceptMapper | null = null) {}

  /**
   * Distinct periods across statements, most recent first. Earlier statements
   * win on duplicates, labels included; a period without a label shows its end date.
   */
  extractPeriods(statements: StatementExtraction[]): StitchPeriod[] {
    const seen = new Map<string, StitchPeriod>();
    for (const statement of statements) {
      for (const key of Object.keys(statement.periods)) {
        if (seen.has(key)) continue;
        const parsed = parsePeriodKey(key);
        if (!parsed) {
          debug(`stitching: skipping malformed period key ${key}`);
          continue;
        }
        seen.set(key, { ...parsed, label: statement.periods[key].label || formatShortDate(parsed.end) });
      }
    }
    return [...seen.values()].sort((a, b) => b.end.getTime() - a.end.getTime());
  }

  stitch(
    statements: StatementExtraction[],
    policy: string = 'RECENT_PERIODS',
    maxPeriods: number = 3,
    standardize: boolean = true,
    options: StitchOptions = {}
  ): StitchedStatement {
    const selected = selectPeriods(this.extractPeriods(statements), resolvePeriodType(policy), maxPeriods);
    const selectedKeys = new Set(selected.map(p => p.key));
    const rows = new Map<string, RowState>();

    for (const statement of statements) {
      const relevant = Object.keys(statement.periods).filter(k => selectedKeys.has(k));
      if (relevant.length === 0) continue;

      const items = standardize
        ? standardizeStatement(statement.data, this.mapper ?? getDefaultConceptMapper(), statement.statement_type)
        : statement.data;
      this.integrate(rows, items, relevant, options.keyBy ?? 'label');
    }

    let ordered = [...rows.values()];
    if ((options.order ?? 'level') === 'level') {
      ordered = ordered.sort((a, b) => a.level - b.level || (a.label < b.label ? -1 : a.label > b.label ? 1 : 0));
    }

    const statementData: StitchedRow[] = [];
    for (const row of ordered) {
      const hasValues = Object.keys(row.values).length > 0;
      if (!hasValues && !row.is_abstract) continue;
      statementData.push({ ...row, has_values: hasValues });
    }

    return {
      periods: selected.map(p => ({ key: p.key, label: p.label })),
      statement_data: statementData,
    };
  }

  private integrate(rows: Map<string, RowState>, items: LineItem[], periodKeys: string[], keyBy: 'label' | 'concept'): void {
    for (const item of items) {
      if (!item.concept || !item.label) continue;
      if (item.is_abstract && item.children.length === 0) continue;
      if (BRACKETED.some(b => item.label.includes(b))) continue;

      const key = keyBy === 'concept' ? `${item.label}|${item.concept}` : item.label;
      let row = rows.get(key);
      if (!row) {
        row = {
          label: item.label,
          concept: item.concept,
          level: item.level,
          is_abstract: item.is_abstract,
          is_total: item.is_total === true || item.label.toLowerCase().includes('total'),
          values: {},
          decimals: {},
        };
        rows.set(key, row);
      }

      for (const periodKey of periodKeys) {
        const value = item.values[periodKey];
        if (value === undefined) continue;
        row.values[periodKey] = value;
        row.decimals[periodKey] = item.decimals[periodKey] ?? 0;
      }
    }
  }
}

/** Stitch `statementType` across documents, ordered newest filing first */
export function stitchStatements(
  sources: StatementSource[],
  statementType: StatementType,
  periodType: string = 'RECENT_PERIODS',
  maxPeriods: number = 3,
  standardize: boolean = true,
  options: StitchOptions = {}
): StitchedStatement {
  const statements: StatementExtraction[] = [];
  for (const source of sources) {
    const statement = source.getStatementByType(statementType);
    if (statement) statements.push(statement);
  }
  return new StatementStitcher().stitch(statements, periodType, maxPeriods, standardize, options);
}

// ── Tabular view ───────────────────────────────────────────────────────

export interface StitchedTable {
  columns: string[];
  rows: Array<{ label: string; level: number; cells: Array<LineItemValue | null> }>;
}

/** Period labels as columns; abstract rows without values are dropped */
export function stitchedToTable(stitched: StitchedStatement): StitchedTable {
  return {
    columns: stitched.periods.map(p => p.label),
    rows: stitched.statement_data
      .filter(row => !(row.is_abstract && !row.has_values))
      .map(row => ({
        label: row.label,
        level: row.level,
        cells: stitched.periods.map(p => row.values[p.key] ?? null),
      })),
  };
}
