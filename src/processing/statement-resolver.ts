import type {
  Fact,
  LineItem,
  LineItemValue,
  PresentationTree,
  StatementExtraction,
  StatementInfo,
  StatementType,
} from '../core/types.js';
import type { XbrlModel } from '../parsing/xbrl-parser.js';
import { normalizeElementId } from '../parsing/element-id.js';
import { StatementRegistry, defaultStatementRegistry, isParenthetical } from './statement-registry.js';

/**
 * Statement resolver: turns a role URI, statement type or role name into a
 * presentation tree, then walks the tree into line items with per-period values.
 *
 * Resolution order:
 * 1. Exact role URI
 * 2. Statement type (BalanceSheet, IncomeStatement, ...)
 * 3. Short role name, case-insensitive
 * 4. Definition with whitespace removed
 * 5. Substring of a short role name or definition
 */

export type ResolverModel = Pick<XbrlModel, 'catalog' | 'facts' | 'contexts' | 'presentation_trees' | 'context_period_map' | 'periods' | 'tables'>;

type RoleMatcher = (query: string, statements: StatementInfo[]) => StatementInfo | null;

const DIMENSION_KEYWORDS = /segment|geograph|region|product|business/i;

/** Last segment of a role URI: `http://x.com/role/BalanceSheet` -> `BalanceSheet` */
export function shortRoleName(roleUri: string): string {
  const parts = roleUri.split(/[/#]/);
  return parts[parts.length - 1];
}

const squash = (s: string): string => s.replace(/\s+/g, '').toLowerCase();

/** Non-parenthetical statements first, otherwise presentation order */
function preferPrimary(candidates: StatementInfo[]): StatementInfo | null {
  return candidates.find(s => !isParenthetical(s.definition)) ?? candidates[0] ?? null;
}

// ── Matchers ───────────────────────────────────────────────────────────

const exactRole: RoleMatcher = (query, statements) =>
  statements.find(s => s.role === query) ?? null;

const byType: RoleMatcher = (query, statements) =>
  preferPrimary(statements.filter(s => s.type === query));

const byShortName: RoleMatcher = (query, statements) => {
  const q = query.toLowerCase();
  return preferPrimary(statements.filter(s => s.role_name.toLowerCase() === q));
};

const byDefinition: RoleMatcher = (query, statements) => {
  const q = squash(query);
  return preferPrimary(statements.filter(s => squash(s.definition) === q));
};

const bySubstring: RoleMatcher = (query, statements) => {
  const q = query.toLowerCase();
  if (!q) return null;
  return preferPrimary(statements.filter(s =>
    s.role_name.toLowerCase().includes(q) || s.definition.toLowerCase().includes(q)
  ));
};

export const ROLE_MATCHERS: readonly RoleMatcher[] = [exactRole, byType, byShortName, byDefinition, bySubstring];

// ── Resolver ───────────────────────────────────────────────────────────

interface PeriodValue {
  value: LineItemValue;
  decimals: number | null;
}

function decimalsOf(fact: Fact): number | null {
  if (fact.decimals === null) return null;
  return fact.decimals === 'INF' ? 0 : fact.decimals;
}

function valueOf(fact: Fact): PeriodValue {
  return { value: fact.numeric_value ?? fact.value, decimals: decimalsOf(fact) };
}

function toRecords(byPeriod: Map<string, PeriodValue>): Pick<LineItem, 'values' | 'decimals'> {
  const values: Record<string, LineItemValue> = {};
  const decimals: Record<string, number> = {};
  for (const [key, pv] of byPeriod) {
    values[key] = pv.value;
    if (pv.decimals !== null) decimals[key] = pv.decimals;
  }
  return { values, decimals };
}

export class StatementResolver {
  private statements: StatementInfo[] | null = null;

  constructor(
    private readonly model: ResolverModel,
    private readonly registry: StatementRegistry = defaultStatementRegistry
  ) {}

  getAllStatements(): StatementInfo[] {
    if (this.statements) return this.statements;
    const trees = [...this.model.presentation_trees.values()].sort((a, b) => a.order - b.order);
    this.statements = trees.map(tree => ({
      role: tree.role_uri,
      definition: tree.definition,
      element_count: tree.all_nodes.size,
      type: this.registry.detectType(tree.root_element_ids, tree.definition),
      primary_concept: this.registry.primaryConcept(tree.root_element_ids),
      role_name: shortRoleName(tree.role_uri),
    }));
    return this.statements;
  }

  /** Role URI for a role, type or name; null when nothing matches */
  findStatement(roleOrType: string): StatementInfo | null {
    const statements = this.getAllStatements();
    for (const match of ROLE_MATCHERS) {
      const hit = match(roleOrType, statements);
      if (hit) return hit;
    }
    return null;
  }

  getStatement(roleOrType: string, periodFilter?: string): LineItem[] {
    const info = this.findStatement(roleOrType);
    if (!info) return [];
    const tree = this.model.presentation_trees.get(info.role);
    if (!tree) return [];
    return this.lineItems(tree, info.type, periodFilter);
  }

  getStatementByType(type: StatementType): StatementExtraction | null {
    const info = preferPrimary(this.getAllStatements().filter(s => s.type === type));
    if (!info) return null;
    const tree = this.model.presentation_trees.get(info.role);
    if (!tree) return null;

    const data = this.lineItems(tree, info.type, undefined);
    const used = new Set<string>();
    for (const item of data) for (const key of Object.keys(item.values)) used.add(key);

    const periods: Record<string, { label: string }> = {};
    for (const period of this.model.periods) {
      if (used.has(period.key)) periods[period.key] = { label: period.label };
    }
    return { role: info.role, definition: info.definition, statement_type: type, periods, data };
  }

  isDimensionDisplaying(type: StatementType | null, definition: string): boolean {
    return type === null && DIMENSION_KEYWORDS.test(definition);
  }

  private dimensionsOf(fact: Fact): Record<string, string> {
    return this.model.contexts.get(fact.context_ref)?.dimensions ?? {};
  }

  private periodKeyOf(fact: Fact, periodFilter: string | undefined): string | null {
    const key = this.model.context_period_map.get(fact.context_ref);
    if (key === undefined) return null;
    if (periodFilter !== undefined && key !== periodFilter) return null;
    return key;
  }

  /** Fewest dimension qualifiers wins per period; ties keep document order */
  private collapsedValues(facts: Fact[], periodFilter: string | undefined): Map<string, PeriodValue> {
    const grouped = new Map<string, Fact[]>();
    for (const fact of facts) {
      const key = this.periodKeyOf(fact, periodFilter);
      if (key === null) continue;
      const list = grouped.get(key) ?? [];
      list.push(fact);
      grouped.set(key, list);
    }

    const out = new Map<string, PeriodValue>();
    for (const [key, list] of grouped) {
      const ranked = list
        .map(fact => ({ fact, dims: Object.keys(this.dimensionsOf(fact)).length }))
        .sort((a, b) => a.dims - b.dims);
      out.set(key, valueOf(ranked[0].fact));
    }
    return out;
  }

  private memberLabel(memberId: string): string {
    return this.model.catalog.standardLabel(memberId) ?? memberId;
  }

  /** Axes of the hypercubes declared on a role, in underscore form; null when the role declares none */
  private roleAxes(roleUri: string): Set<string> | null {
    const tables = [...this.model.tables.values()].filter(t => t.role_uri === roleUri);
    if (tables.length === 0) return null;
    return new Set(tables.flatMap(t => t.axes.map(normalizeElementId)));
  }

  /**
   * One synthetic row per distinct dimension combination. Facts carrying an
   * axis outside `validAxes` belong to another role's hypercube and are skipped.
   * A "Total" row is appended for the default-context facts, when there are any.
   */
  private dimensionRows(
    parent: LineItem,
    facts: Fact[],
    periodFilter: string | undefined,
    validAxes: Set<string> | null
  ): LineItem[] {
    const defaults = new Map<string, PeriodValue>();
    const combos = new Map<string, { members: string[]; values: Map<string, PeriodValue> }>();

    for (const fact of facts) {
      const key = this.periodKeyOf(fact, periodFilter);
      if (key === null) continue;
      const dims = Object.entries(this.dimensionsOf(fact)).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      if (dims.length === 0) {
        if (!defaults.has(key)) defaults.set(key, valueOf(fact));
        continue;
      }
      if (validAxes && !dims.every(([axis]) => validAxes.has(normalizeElementId(axis)))) continue;
      const comboKey = dims.map(([d, m]) => `${d}=${m}`).join('|');
      const combo = combos.get(comboKey) ?? { members: dims.map(([, m]) => m), values: new Map<string, PeriodValue>() };
      if (!combo.values.has(key)) combo.values.set(key, valueOf(fact));
      combos.set(comboKey, combo);
    }

    if (combos.size === 0) return [];

    const row = (label: string, dimension: string[], values: Map<string, PeriodValue>): LineItem => ({
      ...toRecords(values),
      concept: parent.concept,
      name: parent.name,
      label,
      level: parent.level + 1,
      is_abstract: false,
      children: [],
      has_values: values.size > 0,
      preferred_label: null,
      dimension,
      is_dimension_row: true,
    });

    const rows: LineItem[] = [];
    for (const combo of combos.values()) {
      const labels = combo.members.map(m => this.memberLabel(m));
      rows.push(row(labels.join(' - '), labels, combo.values));
    }
    if (defaults.size > 0) rows.push(row('Total', [], defaults));
    return rows;
  }

  private lineItems(tree: PresentationTree, type: StatementType | null, periodFilter: string | undefined): LineItem[] {
    const showDimensions = this.isDimensionDisplaying(type, tree.definition);
    const validAxes = showDimensions ? this.roleAxes(tree.role_uri) : null;
    const items: LineItem[] = [];

    const visit = (elementId: string, level: number, path: Set<string>): void => {
      const node = tree.all_nodes.get(elementId);
      if (!node) return;

      const facts = this.model.facts.factsForElement(elementId);
      const base: LineItem = {
        concept: elementId,
        name: node.element_name,
        label: node.display_label,
        level,
        is_abstract: node.is_abstract,
        values: {},
        decimals: {},
        children: [...node.children],
        has_values: false,
        preferred_label: node.preferred_label,
        dimension: null,
        is_dimension_row: false,
      };

      const dimensionRows = showDimensions ? this.dimensionRows(base, facts, periodFilter, validAxes) : [];
      if (dimensionRows.length > 0) {
        items.push(base, ...dimensionRows);
      } else {
        const values = this.collapsedValues(facts, periodFilter);
        const item: LineItem = { ...base, ...toRecords(values), has_values: values.size > 0 };
        if (item.has_values || item.is_abstract || item.children.length > 0) items.push(item);
      }

      const nextPath = new Set(path).add(elementId);
      for (const child of node.children) {
        if (!nextPath.has(child)) visit(child, level + 1, nextPath);
      }
    };

    for (const root of tree.root_element_ids) visit(root, 0, new Set());
    return items;
  }
}
