import type { Context, Diagnosed, EntityInfo, ReportingPeriod } from '../core/types.js';
import type { FactStore } from '../core/fact-store.js';
import { periodEnd } from './reporting-periods.js';

/**
 * Entity information from the dei (document and entity information) facts.
 */

export const EMPTY_ENTITY_INFO: EntityInfo = {
  entity_name: null,
  ticker: null,
  identifier: null,
  document_type: null,
  fiscal_year: null,
  fiscal_period: null,
  fiscal_year_end_month: null,
  fiscal_year_end_day: null,
  document_period_end_date: null,
  reporting_end_date: null,
  annual_report: false,
  quarterly_report: false,
  amendment: false,
};

function deiValue(facts: FactStore, local: string): string | null {
  const candidates = facts.factsForElement(`dei_${local}`);
  if (candidates.length === 0) return null;
  const first = candidates.reduce((a, b) => (b.instance_id < a.instance_id ? b : a));
  return first.value || null;
}

function isTrue(value: string | null): boolean {
  return value !== null && ['true', '1'].includes(value.trim().toLowerCase());
}

/** Leading zeros are stripped from an all-digit CIK */
export function normalizeIdentifier(identifier: string): string {
  return /^\d+$/.test(identifier) ? identifier.replace(/^0+(?=\d)/, '') : identifier;
}

/** "--09-30" -> { month: 9, day: 30 } */
export function parseFiscalYearEnd(value: string | null): { month: number; day: number } | null {
  if (!value) return null;
  const m = /^--(\d{2})-(\d{2})$/.exec(value.trim());
  if (!m) return null;
  return { month: Number(m[1]), day: Number(m[2]) };
}

export function extractEntityInfo(
  facts: FactStore,
  contexts: ReadonlyMap<string, Context>,
  periods: ReportingPeriod[]
): Diagnosed<EntityInfo> {
  try {
    const documentType = deiValue(facts, 'DocumentType');
    const fiscalYear = deiValue(facts, 'DocumentFiscalYearFocus');
    const fiscalYearEnd = parseFiscalYearEnd(deiValue(facts, 'CurrentFiscalYearEndDate'));
    const firstContext = contexts.values().next();
    const identifier = firstContext.done ? null : firstContext.value.entity.identifier || null;

    const info: EntityInfo = {
      entity_name: deiValue(facts, 'EntityRegistrantName'),
      ticker: deiValue(facts, 'TradingSymbol'),
      identifier: identifier === null ? null : normalizeIdentifier(identifier),
      document_type: documentType,
      fiscal_year: fiscalYear && /^\d{4}$/.test(fiscalYear) ? parseInt(fiscalYear, 10) : null,
      fiscal_period: deiValue(facts, 'DocumentFiscalPeriodFocus'),
      fiscal_year_end_month: fiscalYearEnd ? fiscalYearEnd.month : null,
      fiscal_year_end_day: fiscalYearEnd ? fiscalYearEnd.day : null,
      document_period_end_date: deiValue(facts, 'DocumentPeriodEndDate'),
      reporting_end_date: periods.length > 0 ? periodEnd(periods[0]) : null,
      annual_report: documentType !== null
        ? documentType.startsWith('10-K')
        : isTrue(deiValue(facts, 'DocumentAnnualReport')),
      quarterly_report: documentType !== null
        ? documentType.startsWith('10-Q')
        : isTrue(deiValue(facts, 'DocumentQuarterlyReport')),
      amendment: (documentType?.includes('/A') ?? false) || isTrue(deiValue(facts, 'AmendmentFlag')),
    };
    return { value: info, warnings: [] };
  } catch (err) {
    return {
      value: { ...EMPTY_ENTITY_INFO },
      warnings: [`could not extract entity info: ${err instanceof Error ? err.message : String(err)}`],
    };
  }
}
