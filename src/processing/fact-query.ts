import type {
  Balance,
  Decimals,
  Fact,
  PeriodTypeAttr,
  PeriodView,
  StatementInfo,
  StatementType,
  Unit,
} from '../core/types.js';
import type { XbrlModel } from '../parsing/xbrl-parser.js';
import { parseDate } from '../core/dates.js';
import { normalizeElementId } from '../parsing/element-id.js';
import { periodEnd } from './reporting-periods.js';

/**
 * Fact query: every fact joined with its context, unit, element and
 * statement, filtered through a fluent builder.
 *
 *   doc.facts.query().byConcept('Revenue').byPeriodType('duration').limit(10).execute()
 */

export interface EnrichedFact {
  concept: string;
  fact_key: string;
  context_ref: string;
  value: string;
  numeric_value: number | null;
  decimals: Decimals | null;
  unit_ref: string | null;
  /** "USD", or "USD/shares" for divide units */
  unit: string | null;
  period_type: 'instant' | 'duration' | 'forever' | null;
  period_instant: string | null;
  period_start: string | null;
  period_end: string | null;
  period_key: string | null;
  entity_identifier: string | null;
  entity_scheme: string | null;
  /** dimension (ns_Axis) -> member */
  dimensions: Record<string, string>;
  element_name: string | null;
  element_type: string | null;
  element_period_type: PeriodTypeAttr | null;
  element_balance: Balance | null;
  label: string | null;
  statement_type: StatementType | null;
  statement_role: string | null;
  fiscal_year: number | null;
  fiscal_period: string | null;
}

export type FactColumn = Exclude<keyof EnrichedFact, 'dimensions'>;
export type FactCell = string | number | null;
export type FactFilter = (fact: EnrichedFact) => boolean;

export interface FactTable {
  columns: string[];
  rows: Array<Record<string, FactCell>>;
}

/** What a FactsView needs from its document */
export interface FactsSource {
  readonly model: Pick<XbrlModel, 'facts' | 'contexts' | 'units' | 'catalog' | 'context_period_map' | 'periods' | 'presentation_trees' | 'entity_info'>;
  getAllStatements(): StatementInfo[];
  getPeriodViews(statementType: string): PeriodView[];
}

const CONTEXT_COLUMNS: readonly string[] = [
  'context_ref', 'entity_identifier', 'entity_scheme',
  'period_type', 'period_instant', 'period_start', 'period_end',
];

const ELEMENT_COLUMNS: readonly string[] = ['element_name', 'element_type', 'element_period_type', 'element_balance'];

export function formatUnit(unit: Unit): string {
  const measure = (m: string): string => m.includes(':') ? m.slice(m.indexOf(':') + 1) : m;
  if (unit.kind === 'simple') return unit.measures.map(measure).join('*');
  return `${unit.numerator.map(measure).join('*')}/${unit.denominator.map(measure).join('*')}`;
}

function compareCells(a: FactCell, b: FactCell): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

// ── Query ──────────────────────────────────────────────────────────────

export class FactQuery {
  private readonly filters: FactFilter[] = [];
  private includeDimensions = true;
  private includeContexts = true;
  private includeElementInfo = true;
  private sortColumn: FactColumn | null = null;
  private sortAscending = true;
  private maxResults: number | null = null;

  constructor(private readonly view: FactsView) {}

  private where(filter: FactFilter): this {
    this.filters.push(filter);
    return this;
  }

  /** Regex (case-insensitive) against the concept, or exact when `exact` */
  byConcept(pattern: string, exact: boolean = false): this {
    if (exact) {
      const wanted = normalizeElementId(pattern);
      return this.where(f => f.concept === wanted);
    }
    const re = new RegExp(pattern, 'i');
    return this.where(f => re.test(f.concept));
  }

  byLabel(pattern: string, exact: boolean = false): this {
    if (exact) return this.where(f => f.label === pattern);
    const re = new RegExp(pattern, 'i');
    return this.where(f => f.label !== null && re.test(f.label));
  }

  /** A predicate, an inclusive [min, max] range, or an exact number */
  byValue(filter: ((value: number) => boolean) | [number, number] | number): this {
    if (typeof filter === 'function') {
      return this.where(f => f.numeric_value !== null && filter(f.numeric_value));
    }
    if (Array.isArray(filter)) {
      const [min, max] = filter;
      return this.where(f => f.numeric_value !== null && f.numeric_value >= min && f.numeric_value <= max);
    }
    return this.where(f => f.numeric_value === filter);
  }

  byPeriodType(periodType: 'instant' | 'duration'): this {
    return this.where(f => f.period_type === periodType);
  }

  byPeriodKey(periodKey: string): this {
    return this.where(f => f.period_key === periodKey);
  }

  byPeriodKeys(periodKeys: string[]): this {
    const keys = new Set(periodKeys);
    return this.where(f => f.period_key !== null && keys.has(f.period_key));
  }

  /** Exact instant date, or every instant on or before it */
  byInstantDate(date: string, exact: boolean = true): this {
    if (exact) return this.where(f => f.period_instant === date);
    const limit = parseDate(date);
    if (!limit) return this.where(() => false);
    return this.where(f => {
      const d = f.period_instant === null ? null : parseDate(f.period_instant);
      return d !== null && d.getTime() <= limit.getTime();
    });
  }

  /** Durations starting on/after `start` and ending on/before `end` */
  byDateRange(start?: string, end?: string): this {
    const from = start ? parseDate(start) : null;
    const to = end ? parseDate(end) : null;
    return this.where(f => {
      if (f.period_start === null || f.period_end === null) return false;
      const s = parseDate(f.period_start);
      const e = parseDate(f.period_end);
      if (!s || !e) return false;
      if (from && s.getTime() < from.getTime()) return false;
      if (to && e.getTime() > to.getTime()) return false;
      return true;
    });
  }

  byDimension(dimension: string, member?: string): this {
    const dim = normalizeElementId(dimension);
    if (member === undefined) return this.where(f => dim in f.dimensions);
    return this.where(f => f.dimensions[dim] === member);
  }

  byStatementType(statementType: string): this {
    return this.where(f => f.statement_type === statementType);
  }

  byFiscalPeriod(fiscalPeriod: string): this {
    return this.where(f => f.fiscal_period === fiscalPeriod);
  }

  byFiscalYear(fiscalYear: number | string): this {
    return this.where(f => f.fiscal_year !== null && String(f.fiscal_year) === String(fiscalYear));
  }

  byUnit(unitRef: string): this {
    return this.where(f => f.unit_ref === unitRef);
  }

  byCustom(filter: FactFilter): this {
    return this.where(filter);
  }

  /** Case-insensitive search across concept, label and element name */
  byText(pattern: string): this {
    const re = new RegExp(pattern, 'i');
    return this.where(f =>
      re.test(f.concept) ||
      (f.label !== null && re.test(f.label)) ||
      (f.element_name !== null && re.test(f.element_name))
    );
  }

  excludeDimensions(): this {
    this.includeDimensions = false;
    return this;
  }

  excludeContexts(): this {
    this.includeContexts = false;
    return this;
  }

  excludeElementInfo(): this {
    this.includeElementInfo = false;
    return this;
  }

  sortBy(column: FactColumn, ascending: boolean = true): this {
    this.sortColumn = column;
    this.sortAscending = ascending;
    return this;
  }

  limit(n: number): this {
    this.maxResults = n;
    return this;
  }

  execute(): EnrichedFact[] {
    let results = this.view.getFacts().filter(f => this.filters.every(match => match(f)));

    const column = this.sortColumn;
    if (column) {
      const direction = this.sortAscending ? 1 : -1;
      results = [...results].sort((a, b) => {
        const cmp = compareCells(a[column], b[column]);
        // nulls stay last whichever the direction
        if (a[column] === null || b[column] === null) return cmp;
        return cmp * direction;
      });
    }

    if (this.maxResults !== null) results = results.slice(0, this.maxResults);
    return results;
  }

  /** Flat rows; dimensions become dim_* columns and all-empty columns are dropped */
  toDataFrame(): FactTable {
    const rows = this.execute().map(fact => {
      const row: Record<string, FactCell> = {};
      for (const [key, value] of Object.entries(fact)) {
        if (key === 'dimensions') continue;
        if (!this.includeContexts && CONTEXT_COLUMNS.includes(key)) continue;
        if (!this.includeElementInfo && ELEMENT_COLUMNS.includes(key)) continue;
        if (typeof value === 'string' || typeof value === 'number' || value === null) row[key] = value;
      }
      if (this.includeDimensions) {
        for (const [dim, member] of Object.entries(fact.dimensions)) row[`dim_${dim}`] = member;
      }
      return row;
    });

    const columns: string[] = [];
    for (const row of rows) {
      for (const key of Object.keys(row)) if (!columns.includes(key)) columns.push(key);
    }
    const kept = columns.filter(c => rows.some(r => r[c] !== undefined && r[c] !== null));

    return {
      columns: kept,
      rows: rows.map(r => Object.fromEntries(kept.map(c => [c, r[c] ?? null]))),
    };
  }
}

// ── View ───────────────────────────────────────────────────────────────

export interface FactsSummary {
  total_facts: number;
  numeric_facts: number;
  dimensioned_facts: number;
  unique_concepts: number;
  period_keys: number;
  by_statement_type: Record<string, number>;
}

export class FactsView {
  private cache: EnrichedFact[] | null = null;

  constructor(private readonly source: FactsSource) {}

  query(): FactQuery {
    return new FactQuery(this);
  }

  getFacts(): EnrichedFact[] {
    if (!this.cache) this.cache = this.enrich();
    return this.cache;
  }

  private enrich(): EnrichedFact[] {
    const { model } = this.source;

    const statementOf = new Map<string, StatementInfo>();
    for (const info of this.source.getAllStatements()) {
      if (!info.type) continue;
      const tree = model.presentation_trees.get(info.role);
      if (!tree) continue;
      for (const id of tree.all_nodes.keys()) {
        if (!statementOf.has(id)) statementOf.set(id, info);
      }
    }

    const fiscalKeys = new Set<string>();
    const docEnd = model.entity_info.document_period_end_date;
    if (docEnd) {
      for (const p of model.periods) if (periodEnd(p) === docEnd) fiscalKeys.add(p.key);
    }

    return model.facts.all().map(fact => this.enrichOne(fact, statementOf, fiscalKeys));
  }

  private enrichOne(fact: Fact, statementOf: Map<string, StatementInfo>, fiscalKeys: Set<string>): EnrichedFact {
    const { model } = this.source;
    const concept = normalizeElementId(fact.element_id);
    const context = model.contexts.get(fact.context_ref) ?? null;
    const unit = fact.unit_ref ? model.units.get(fact.unit_ref) ?? null : null;
    const element = model.catalog.get(concept);
    const periodKey = model.context_period_map.get(fact.context_ref) ?? null;
    const statement = statementOf.get(concept) ?? null;
    const period = context?.period ?? null;
    const inFiscalPeriod = periodKey !== null && fiscalKeys.has(periodKey);

    const dimensions: Record<string, string> = {};
    for (const [dim, member] of Object.entries(context?.dimensions ?? {})) {
      dimensions[normalizeElementId(dim)] = member;
    }

    return {
      concept,
      fact_key: `${concept}|${fact.context_ref}`,
      context_ref: fact.context_ref,
      value: fact.value,
      numeric_value: fact.numeric_value,
      decimals: fact.decimals,
      unit_ref: fact.unit_ref,
      unit: unit ? formatUnit(unit) : null,
      period_type: period ? period.type : null,
      period_instant: period?.type === 'instant' ? period.instant : null,
      period_start: period?.type === 'duration' ? period.start_date : null,
      period_end: period?.type === 'duration' ? period.end_date : null,
      period_key: periodKey,
      entity_identifier: context?.entity.identifier ?? null,
      entity_scheme: context?.entity.scheme ?? null,
      dimensions,
      element_name: element?.name ?? null,
      element_type: element?.data_type || null,
      element_period_type: element?.period_type ?? null,
      element_balance: element?.balance ?? null,
      label: model.catalog.standardLabel(concept),
      statement_type: statement?.type ?? null,
      statement_role: statement?.role ?? null,
      fiscal_year: inFiscalPeriod ? model.entity_info.fiscal_year : null,
      fiscal_period: inFiscalPeriod ? model.entity_info.fiscal_period : null,
    };
  }

  summarize(): FactsSummary {
    const facts = this.getFacts();
    const byStatement: Record<string, number> = {};
    for (const f of facts) {
      if (f.statement_type) byStatement[f.statement_type] = (byStatement[f.statement_type] ?? 0) + 1;
    }
    return {
      total_facts: facts.length,
      numeric_facts: facts.filter(f => f.numeric_value !== null).length,
      dimensioned_facts: facts.filter(f => Object.keys(f.dimensions).length > 0).length,
      unique_concepts: new Set(facts.map(f => f.concept)).size,
      period_keys: new Set(facts.map(f => f.period_key).filter(k => k !== null)).size,
      by_statement_type: byStatement,
    };
  }

  getUniqueConcepts(): string[] {
    return [...new Set(this.getFacts().map(f => f.concept))].sort();
  }

  /** dimension -> distinct members, in first-seen order */
  getUniqueDimensions(): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    for (const f of this.getFacts()) {
      for (const [dim, member] of Object.entries(f.dimensions)) {
        const members = out[dim] ?? [];
        if (!members.includes(member)) members.push(member);
        out[dim] = members;
      }
    }
    return out;
  }

  /** Facts of one statement type restricted to a named period view; [] when the view is unknown */
  getFactsByPeriodView(statementType: string, viewName: string): EnrichedFact[] {
    const view = this.source.getPeriodViews(statementType).find(v => v.name === viewName);
    if (!view) return [];
    return this.query().byStatementType(statementType).byPeriodKeys(view.period_keys).execute();
  }
}
