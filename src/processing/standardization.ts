import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { LineItem } from '../core/types.js';
import { MappingFileError } from '../core/errors.js';
import { getConfig } from '../core/config.js';
import { debug } from '../core/logger.js';
import { normalizeElementId } from '../parsing/element-id.js';
import { similarity } from './text-similarity.js';

/**
 * Concept standardization: maps filer-specific concepts onto a small common
 * vocabulary so statements from different filers and years line up.
 *
 * Lookup order:
 * 1. Curated mapping table (data/concept-mappings.json or XBRL_CONCEPT_MAPPINGS)
 * 2. Label-similarity inference, accepted only above CONFIDENCE_THRESHOLD
 */

export const StandardConcept = {
  // Balance sheet: assets
  CASH_AND_EQUIVALENTS: 'Cash and Cash Equivalents',
  ACCOUNTS_RECEIVABLE: 'Accounts Receivable',
  INVENTORY: 'Inventory',
  PREPAID_EXPENSES: 'Prepaid Expenses',
  TOTAL_CURRENT_ASSETS: 'Total Current Assets',
  PROPERTY_PLANT_EQUIPMENT: 'Property, Plant and Equipment',
  GOODWILL: 'Goodwill',
  INTANGIBLE_ASSETS: 'Intangible Assets',
  TOTAL_ASSETS: 'Total Assets',

  // Balance sheet: liabilities
  ACCOUNTS_PAYABLE: 'Accounts Payable',
  ACCRUED_LIABILITIES: 'Accrued Liabilities',
  SHORT_TERM_DEBT: 'Short-Term Debt',
  TOTAL_CURRENT_LIABILITIES: 'Total Current Liabilities',
  LONG_TERM_DEBT: 'Long-Term Debt',
  DEFERRED_REVENUE: 'Deferred Revenue',
  TOTAL_LIABILITIES: 'Total Liabilities',

  // Balance sheet: equity
  COMMON_STOCK: 'Common Stock',
  RETAINED_EARNINGS: 'Retained Earnings',
  TOTAL_EQUITY: "Total Stockholders' Equity",

  // Income statement
  REVENUE: 'Revenue',
  COST_OF_REVENUE: 'Cost of Revenue',
  GROSS_PROFIT: 'Gross Profit',
  OPERATING_EXPENSES: 'Operating Expenses',
  RESEARCH_AND_DEVELOPMENT: 'Research and Development Expense',
  SELLING_GENERAL_ADMIN: 'Selling, General and Administrative Expense',
  OPERATING_INCOME: 'Operating Income',
  INTEREST_EXPENSE: 'Interest Expense',
  INCOME_BEFORE_TAX: 'Income Before Tax',
  INCOME_TAX_EXPENSE: 'Income Tax Expense',
  NET_INCOME: 'Net Income',

  // Cash flow statement
  CASH_FROM_OPERATIONS: 'Net Cash from Operating Activities',
  CASH_FROM_INVESTING: 'Net Cash from Investing Activities',
  CASH_FROM_FINANCING: 'Net Cash from Financing Activities',
  NET_CHANGE_IN_CASH: 'Net Change in Cash',
} as const;

export type StandardConceptName = typeof StandardConcept[keyof typeof StandardConcept];

export const STANDARD_CONCEPTS: readonly StandardConceptName[] = Object.values(StandardConcept);

export const CONFIDENCE_THRESHOLD = 0.8;
export const MIN_CANDIDATE_SCORE = 0.5;

export const DEFAULT_MAPPINGS_PATH = fileURLToPath(new URL('../../data/concept-mappings.json', import.meta.url));

// ── Mapping store ──────────────────────────────────────────────────────

const flatMappingsSchema = z.record(z.array(z.string()));
const nestedMappingsSchema = z.record(z.record(z.array(z.string())));
const mappingFileSchema = z.union([flatMappingsSchema, nestedMappingsSchema]);

export class MappingStore {
  private readonly mappings = new Map<string, Set<string>>();
  private readonly reverse = new Map<string, string>();

  constructor(mappings: Record<string, Iterable<string>> = {}, public readonly source: string | null = null) {
    for (const [standard, concepts] of Object.entries(mappings)) {
      for (const concept of concepts) this.add(concept, standard);
    }
  }

  /** Accepts `{ standard: [concepts] }` or `{ statementType: { standard: [concepts] } }` */
  static fromObject(data: unknown, source: string): MappingStore {
    const parsed = mappingFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new MappingFileError(parsed.error.issues[0]?.message ?? 'unexpected shape', source);
    }

    const flat: Record<string, string[]> = {};
    for (const [key, value] of Object.entries<string[] | Record<string, string[]>>(parsed.data)) {
      if (Array.isArray(value)) {
        flat[key] = [...(flat[key] ?? []), ...value];
      } else {
        for (const [standard, concepts] of Object.entries(value)) {
          flat[standard] = [...(flat[standard] ?? []), ...concepts];
        }
      }
    }
    return new MappingStore(flat, source);
  }

  /** A missing file falls back to the bundled defaults */
  static fromFile(path: string): MappingStore {
    if (!existsSync(path)) {
      debug(`concept mapping file ${path} not found; using defaults`);
      return MappingStore.fromDefaults();
    }

    let data: unknown;
    try {
      data = JSON.parse(readFileSync(path, 'utf8'));
    } catch (err) {
      throw new MappingFileError(err instanceof Error ? err.message : String(err), path);
    }
    return MappingStore.fromObject(data, path);
  }

  static fromDefaults(): MappingStore {
    return MappingStore.fromObject(JSON.parse(readFileSync(DEFAULT_MAPPINGS_PATH, 'utf8')), DEFAULT_MAPPINGS_PATH);
  }

  /** The configured mapping file, else the bundled defaults */
  static load(): MappingStore {
    const configured = getConfig().conceptMappingsPath;
    return configured ? MappingStore.fromFile(configured) : MappingStore.fromDefaults();
  }

  getStandardConcept(companyConcept: string): string | null {
    return this.reverse.get(normalizeElementId(companyConcept)) ?? null;
  }

  getCompanyConcepts(standardConcept: string): string[] {
    return [...(this.mappings.get(standardConcept) ?? [])];
  }

  /** In-memory only; call save() to persist */
  add(companyConcept: string, standardConcept: string): void {
    const concepts = this.mappings.get(standardConcept) ?? new Set<string>();
    concepts.add(companyConcept);
    this.mappings.set(standardConcept, concepts);
    const key = normalizeElementId(companyConcept);
    if (!this.reverse.has(key)) this.reverse.set(key, standardConcept);
  }

  toJSON(): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    for (const [standard, concepts] of this.mappings) out[standard] = [...concepts];
    return out;
  }

  save(path: string): void {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, JSON.stringify(this.toJSON(), null, 2) + '\n');
  }
}

// ── Inference ──────────────────────────────────────────────────────────

export interface MappingContext {
  statement_type?: string;
  level?: number;
  is_total?: boolean;
}

export interface InferredMapping {
  concept: string;
  confidence: number;
}

export type InferenceStrategy = (companyConcept: string, label: string, context: MappingContext) => InferredMapping | null;

/** Closest standard concept by label similarity, with statement-specific boosts */
export const inferByLabelSimilarity: InferenceStrategy = (_companyConcept, label, context) => {
  const lower = label.toLowerCase();
  let best: string | null = null;
  let score = 0;

  for (const standard of STANDARD_CONCEPTS) {
    const s = similarity(lower, standard.toLowerCase());
    if (s > score) {
      score = s;
      best = standard;
    }
  }

  if (context.statement_type === 'BalanceSheet' && lower.includes('assets') && lower.includes('total')
    && best === StandardConcept.TOTAL_ASSETS) {
    score = Math.min(1, score + 0.2);
  } else if (context.statement_type === 'IncomeStatement' && (lower.includes('revenue') || lower.includes('sales'))
    && best === StandardConcept.REVENUE) {
    score = Math.min(1, score + 0.2);
  }

  if (best === null || score < MIN_CANDIDATE_SCORE) return null;
  return { concept: best, confidence: score };
};

// ── Mapper ─────────────────────────────────────────────────────────────

export interface PendingMapping {
  concept: string;
  confidence: number;
  label: string;
}

export interface LearnableItem {
  concept: string;
  label: string;
  statement_type?: string;
}

export class ConceptMapper {
  readonly pending = new Map<string, PendingMapping[]>();

  constructor(
    public readonly store: MappingStore,
    private readonly infer: InferenceStrategy = inferByLabelSimilarity
  ) {}

  mapConcept(companyConcept: string, label: string, context: MappingContext = {}): string | null {
    const known = this.store.getStandardConcept(companyConcept);
    if (known) return known;

    const inferred = this.infer(companyConcept, label, context);
    return inferred && inferred.confidence > CONFIDENCE_THRESHOLD ? inferred.concept : null;
  }

  /** Confident inferences go into the store; plausible ones wait in `pending` for review */
  learnMappings(items: LearnableItem[]): void {
    for (const item of items) {
      if (this.store.getStandardConcept(item.concept)) continue;
      const inferred = this.infer(item.concept, item.label, { statement_type: item.statement_type });
      if (!inferred) continue;

      if (inferred.confidence > CONFIDENCE_THRESHOLD) {
        this.store.add(item.concept, inferred.concept);
      } else if (inferred.confidence >= MIN_CANDIDATE_SCORE) {
        const list = this.pending.get(inferred.concept) ?? [];
        list.push({ concept: item.concept, confidence: inferred.confidence, label: item.label });
        this.pending.set(inferred.concept, list);
      }
    }
  }

  savePendingMappings(path: string): void {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, JSON.stringify(Object.fromEntries(this.pending), null, 2) + '\n');
  }
}

let defaultMapper: ConceptMapper | null = null;

export function getDefaultConceptMapper(): ConceptMapper {
  if (!defaultMapper) defaultMapper = new ConceptMapper(MappingStore.load());
  return defaultMapper;
}

export function resetDefaultConceptMapper(): void {
  defaultMapper = null;
}

/** Replace labels with standard concept names; the filer's label is kept as `original_label` */
export function standardizeStatement(items: LineItem[], mapper: ConceptMapper, statementType?: string): LineItem[] {
  return items.map(item => {
    // dimension rows share their parent's concept but are labeled by member
    if (item.is_abstract || item.is_dimension_row) return { ...item };

    const standard = mapper.mapConcept(item.concept, item.label, {
      statement_type: statementType,
      level: item.level,
      is_total: item.label.toLowerCase().includes('total') || item.is_total === true,
    });
    if (!standard) return { ...item };
    return { ...item, label: standard, original_label: item.label };
  });
}
