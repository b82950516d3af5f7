/**
 * Core data model for XBRL filings.
 *
 * Design principles:
 * - Everything is built once per load and read-only afterwards
 * - Element ids are compared in their underscore form (us-gaap_Assets)
 * - Sign correction yields a new fact store, never edits facts in place
 * - Missing data is null / empty, never an exception
 */

// ── Taxonomy ───────────────────────────────────────────────────────────

export type PeriodTypeAttr = 'instant' | 'duration';
export type Balance = 'debit' | 'credit';

export interface ElementCatalogEntry {
  id: string;
  name: string;
  data_type: string;
  period_type: PeriodTypeAttr;
  balance: Balance | null;
  is_abstract: boolean;
  /** label role URI -> text (en-US only) */
  labels: Record<string, string>;
}

export interface RoleType {
  role_uri: string;
  id: string | null;
  definition: string | null;
  used_on: string[];
}

export interface PresentationNode {
  element_id: string;
  element_name: string;
  parent: string | null;
  children: string[];
  depth: number;
  order: number;
  is_abstract: boolean;
  labels: Record<string, string>;
  standard_label: string | null;
  preferred_label: string | null;
  display_label: string;
}

export interface PresentationTree {
  role_uri: string;
  definition: string;
  root_element_id: string;
  root_element_ids: string[];
  all_nodes: Map<string, PresentationNode>;
  order: number;
}

export interface CalculationNode {
  element_id: string;
  parent: string | null;
  children: string[];
  depth: number;
  order: number;
  weight: number;
  balance: Balance | null;
  period_type: PeriodTypeAttr | null;
}

export interface CalculationTree {
  role_uri: string;
  definition: string;
  root_element_id: string;
  root_element_ids: string[];
  all_nodes: Map<string, CalculationNode>;
}

export interface Axis {
  element_id: string;
  label: string;
  domain_id: string | null;
  default_member_id: string | null;
}

export interface Domain {
  element_id: string;
  label: string;
  members: string[];
  parent: string | null;
}

export interface Table {
  element_id: string;
  label: string;
  role_uri: string;
  axes: string[];
  line_items: string[];
}

// ── Instance ───────────────────────────────────────────────────────────

export type ContextPeriod =
  | { type: 'instant'; instant: string }
  | { type: 'duration'; start_date: string; end_date: string }
  | { type: 'forever' };

export interface Context {
  context_id: string;
  entity: { scheme: string; identifier: string };
  period: ContextPeriod | null;
  /** dimension id -> member id (explicit) or child tag name (typed) */
  dimensions: Record<string, string>;
}

export type Unit =
  | { unit_id: string; kind: 'simple'; measures: string[] }
  | { unit_id: string; kind: 'divide'; numerator: string[]; denominator: string[] };

export type Decimals = number | 'INF';

export interface Fact {
  readonly element_id: string;
  readonly context_ref: string;
  readonly value: string;
  readonly numeric_value: number | null;
  readonly decimals: Decimals | null;
  readonly unit_ref: string | null;
  readonly instance_id: number;
}

// ── Periods ────────────────────────────────────────────────────────────

export type DurationClass = 'quarterly' | 'annual' | 'ytd' | 'other';

export interface InstantPeriod {
  type: 'instant';
  key: string;
  date: string;
  label: string;
  context_ids: string[];
}

export interface DurationPeriod {
  type: 'duration';
  key: string;
  start_date: string;
  end_date: string;
  days: number;
  period_type: DurationClass;
  label: string;
  context_ids: string[];
}

export type ReportingPeriod = InstantPeriod | DurationPeriod;

export interface PeriodView {
  name: string;
  description: string;
  period_keys: string[];
}

// ── Entity ─────────────────────────────────────────────────────────────

export interface EntityInfo {
  entity_name: string | null;
  ticker: string | null;
  identifier: string | null;
  document_type: string | null;
  fiscal_year: number | null;
  fiscal_period: string | null;
  fiscal_year_end_month: number | null;
  fiscal_year_end_day: number | null;
  document_period_end_date: string | null;
  reporting_end_date: string | null;
  annual_report: boolean;
  quarterly_report: boolean;
  amendment: boolean;
}

// ── Statements ─────────────────────────────────────────────────────────

export type StatementType =
  | 'BalanceSheet'
  | 'IncomeStatement'
  | 'CashFlowStatement'
  | 'StatementOfEquity'
  | 'ComprehensiveIncome';

export interface StatementInfo {
  role: string;
  definition: string;
  element_count: number;
  type: StatementType | null;
  primary_concept: string;
  role_name: string;
}

export type LineItemValue = number | string;

export interface LineItem {
  concept: string;
  name: string;
  label: string;
  level: number;
  is_abstract: boolean;
  values: Record<string, LineItemValue>;
  decimals: Record<string, number>;
  children: string[];
  has_values: boolean;
  preferred_label: string | null;
  /** member labels of a synthetic dimension row */
  dimension: string[] | null;
  is_dimension_row: boolean;
  /** set when a standard concept replaced the filer's label */
  original_label?: string;
  is_total?: boolean;
}

export interface StatementExtraction {
  role: string;
  definition: string;
  statement_type: StatementType;
  periods: Record<string, { label: string }>;
  data: LineItem[];
}

export interface StitchedRow {
  label: string;
  concept: string;
  level: number;
  is_abstract: boolean;
  is_total: boolean;
  values: Record<string, LineItemValue>;
  decimals: Record<string, number>;
  has_values: boolean;
}

export interface StitchedStatement {
  periods: Array<{ key: string; label: string }>;
  statement_data: StitchedRow[];
}

// ── Diagnostics ────────────────────────────────────────────────────────

/** Best-effort result: the data obtained plus non-fatal warnings */
export interface Diagnosed<T> {
  value: T;
  warnings: string[];
}
