import type { StatementType } from '../core/types.js';
import { normalizeElementId } from '../parsing/element-id.js';
import type { PeriodNature } from './period-views.js';

/**
 * Statement type registry: which root concepts and role-definition keywords
 * identify each core financial statement.
 */

export interface StatementTypeEntry {
  type: StatementType;
  /** Abstract root concepts, underscore form */
  primary_concepts: string[];
  /** Matched case-insensitively against the role definition */
  keywords: RegExp[];
  period_nature: PeriodNature;
  title: string;
}

// Keyword fallback runs in this order; "comprehensive income" and "equity"
// must be tried before the broader income statement patterns.
export const DEFAULT_STATEMENT_TYPES: readonly StatementTypeEntry[] = [
  {
    type: 'ComprehensiveIncome',
    primary_concepts: ['us-gaap_StatementOfComprehensiveIncomeAbstract'],
    keywords: [/comprehensive\s+(income|loss)/i],
    period_nature: 'duration',
    title: 'Statement of Comprehensive Income',
  },
  {
    type: 'StatementOfEquity',
    primary_concepts: [
      'us-gaap_StatementOfStockholdersEquityAbstract',
      'us-gaap_StatementOfShareholdersEquityAbstract',
    ],
    keywords: [/(stockholders|shareholders)['’]?\s+equity/i, /changes\s+in\s+equity/i],
    period_nature: 'duration',
    title: "Statement of Stockholders' Equity",
  },
  {
    type: 'CashFlowStatement',
    primary_concepts: ['us-gaap_StatementOfCashFlowsAbstract'],
    keywords: [/cash\s+flows?/i],
    period_nature: 'duration',
    title: 'Statement of Cash Flows',
  },
  {
    type: 'BalanceSheet',
    primary_concepts: [
      'us-gaap_StatementOfFinancialPositionAbstract',
      'us-gaap_StatementOfFinancialPositionClassifiedAbstract',
      'us-gaap_BalanceSheetAbstract',
    ],
    keywords: [/balance\s+sheets?/i, /financial\s+position/i, /financial\s+condition/i],
    period_nature: 'instant',
    title: 'Balance Sheet',
  },
  {
    type: 'IncomeStatement',
    primary_concepts: ['us-gaap_IncomeStatementAbstract', 'us-gaap_StatementOfIncomeAbstract'],
    keywords: [/statements?\s+of\s+(income|operations|earnings)/i, /income\s+statements?/i],
    period_nature: 'duration',
    title: 'Income Statement',
  },
];

export const CORE_STATEMENT_TYPES: readonly StatementType[] = DEFAULT_STATEMENT_TYPES.map(e => e.type);

const PARENTHETICAL = /parenthetical/i;

export function isParenthetical(definition: string): boolean {
  return PARENTHETICAL.test(definition);
}

export class StatementRegistry {
  private readonly entries: readonly StatementTypeEntry[];
  private readonly byConcept: ReadonlyMap<string, StatementTypeEntry>;

  constructor(entries: readonly StatementTypeEntry[] = DEFAULT_STATEMENT_TYPES) {
    this.entries = entries.map(e => Object.freeze({ ...e, primary_concepts: [...e.primary_concepts] }));
    const byConcept = new Map<string, StatementTypeEntry>();
    for (const entry of this.entries) {
      for (const concept of entry.primary_concepts) byConcept.set(normalizeElementId(concept), entry);
    }
    this.byConcept = byConcept;
  }

  get types(): StatementType[] {
    return this.entries.map(e => e.type);
  }

  entry(type: string): StatementTypeEntry | null {
    return this.entries.find(e => e.type === type) ?? null;
  }

  isStatementType(value: string): value is StatementType {
    return this.entry(value) !== null;
  }

  /** Root concept first, then definition keywords */
  detectType(rootElementIds: readonly string[], definition: string): StatementType | null {
    for (const root of rootElementIds) {
      const hit = this.byConcept.get(normalizeElementId(root));
      if (hit) return hit.type;
    }
    for (const entry of this.entries) {
      if (entry.keywords.some(re => re.test(definition))) return entry.type;
    }
    return null;
  }

  /** The registered root concept among `rootElementIds`, else the first root */
  primaryConcept(rootElementIds: readonly string[]): string {
    for (const root of rootElementIds) {
      if (this.byConcept.has(normalizeElementId(root))) return root;
    }
    return rootElementIds[0] ?? '';
  }

  periodNature(type: string): PeriodNature {
    return this.entry(type)?.period_nature ?? 'duration';
  }
}

export const defaultStatementRegistry = new StatementRegistry();
