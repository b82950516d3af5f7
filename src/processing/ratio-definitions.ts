import type { LineItemValue } from '../core/types.js';
import { StandardConcept } from './standardization.js';
import { computeRatio, roundTo } from './calculations.js';

/**
 * Derived financial ratio definitions.
 *
 * Each ratio divides one standard concept by another, read from the rows of a
 * standardized statement (or several concatenated statements).
 */

export interface RatioDefinition {
  id: string;
  display_name: string;
  description: string;
  numerator: string;   // standard concept label
  denominator: string; // standard concept label
  format: 'percentage' | 'multiple';
}

export const RATIO_DEFINITIONS: RatioDefinition[] = [
  {
    id: 'net_margin',
    display_name: 'Net Profit Margin',
    description: 'Net income as a percentage of revenue',
    numerator: StandardConcept.NET_INCOME,
    denominator: StandardConcept.REVENUE,
    format: 'percentage',
  },
  {
    id: 'gross_margin',
    display_name: 'Gross Margin',
    description: 'Gross profit as a percentage of revenue',
    numerator: StandardConcept.GROSS_PROFIT,
    denominator: StandardConcept.REVENUE,
    format: 'percentage',
  },
  {
    id: 'operating_margin',
    display_name: 'Operating Margin',
    description: 'Operating income as a percentage of revenue',
    numerator: StandardConcept.OPERATING_INCOME,
    denominator: StandardConcept.REVENUE,
    format: 'percentage',
  },
  {
    id: 'current_ratio',
    display_name: 'Current Ratio',
    description: 'Current assets divided by current liabilities',
    numerator: StandardConcept.TOTAL_CURRENT_ASSETS,
    denominator: StandardConcept.TOTAL_CURRENT_LIABILITIES,
    format: 'multiple',
  },
  {
    id: 'debt_to_equity',
    display_name: 'Debt-to-Equity',
    description: 'Total liabilities divided by shareholders equity',
    numerator: StandardConcept.TOTAL_LIABILITIES,
    denominator: StandardConcept.TOTAL_EQUITY,
    format: 'multiple',
  },
  {
    id: 'return_on_assets',
    display_name: 'Return on Assets',
    description: 'Net income as a percentage of total assets',
    numerator: StandardConcept.NET_INCOME,
    denominator: StandardConcept.TOTAL_ASSETS,
    format: 'percentage',
  },
];

export function getRatioDefinition(id: string): RatioDefinition | undefined {
  return RATIO_DEFINITIONS.find(r => r.id === id);
}

const KEYWORDS: Record<string, string> = {
  'net margin': 'net_margin',
  'profit margin': 'net_margin',
  'gross margin': 'gross_margin',
  'operating margin': 'operating_margin',
  'op margin': 'operating_margin',
  'current ratio': 'current_ratio',
  'liquidity': 'current_ratio',
  'debt to equity': 'debt_to_equity',
  'debt/equity': 'debt_to_equity',
  'd/e': 'debt_to_equity',
  'leverage': 'debt_to_equity',
  'roa': 'return_on_assets',
  'return on assets': 'return_on_assets',
};

export function findRatioByName(name: string): RatioDefinition | undefined {
  const lower = name.toLowerCase();

  const byId = RATIO_DEFINITIONS.find(r => r.id === lower);
  if (byId) return byId;

  const byName = RATIO_DEFINITIONS.find(r => r.display_name.toLowerCase() === lower);
  if (byName) return byName;

  const sortedKeywords = Object.entries(KEYWORDS).sort((a, b) => b[0].length - a[0].length);
  for (const [keyword, ratioId] of sortedKeywords) {
    if (lower.includes(keyword)) return getRatioDefinition(ratioId);
  }
  return undefined;
}

export interface RatioRow {
  label: string;
  values: Record<string, LineItemValue>;
}

/** First numeric value of the row labeled `concept`, trying `periodKeys` in order */
export function conceptValue(rows: RatioRow[], concept: string, periodKeys: string[]): number | null {
  for (const row of rows) {
    if (row.label !== concept) continue;
    for (const key of periodKeys) {
      const value = row.values[key];
      if (typeof value === 'number') return value;
    }
  }
  return null;
}

/**
 * Every ratio for one period. Pass several keys to combine a duration with an
 * instant, e.g. net income for the year over total assets at year end.
 */
export function computeRatiosForPeriod(rows: RatioRow[], periodKey: string | string[]): Record<string, number | null> {
  const keys = Array.isArray(periodKey) ? periodKey : [periodKey];
  const out: Record<string, number | null> = {};
  for (const def of RATIO_DEFINITIONS) {
    const ratio = computeRatio(conceptValue(rows, def.numerator, keys), conceptValue(rows, def.denominator, keys));
    out[def.id] = ratio === null ? null
      : def.format === 'percentage' ? roundTo(ratio * 100, 1)
      : roundTo(ratio, 2);
  }
  return out;
}
