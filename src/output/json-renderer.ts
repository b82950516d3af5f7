import type { EntityInfo, LineItem, StatementInfo, StitchedStatement } from '../core/types.js';
import type { EnrichedFact } from '../processing/fact-query.js';
import type { PeriodColumn } from './table-renderer.js';

/**
 * Renders statements and facts as structured JSON for programmatic use.
 */

export function renderStatementJson(
  statement: StatementInfo,
  items: LineItem[],
  columns: PeriodColumn[],
  entity: EntityInfo
): string {
  return JSON.stringify({
    entity: {
      name: entity.entity_name,
      ticker: entity.ticker,
      identifier: entity.identifier,
      document_type: entity.document_type,
      fiscal_year: entity.fiscal_year,
      fiscal_period: entity.fiscal_period,
    },
    statement: {
      role: statement.role,
      type: statement.type,
      definition: statement.definition,
    },
    periods: columns,
    line_items: items.map(item => ({
      concept: item.concept,
      label: item.label,
      level: item.level,
      is_abstract: item.is_abstract,
      is_dimension_row: item.is_dimension_row,
      dimension: item.dimension,
      values: item.values,
      decimals: item.decimals,
    })),
  }, null, 2);
}

export function renderStitchedJson(statementType: string, stitched: StitchedStatement): string {
  return JSON.stringify({
    statement_type: statementType,
    periods: stitched.periods,
    rows: stitched.statement_data.map(row => ({
      label: row.label,
      concept: row.concept,
      level: row.level,
      is_abstract: row.is_abstract,
      is_total: row.is_total,
      values: row.values,
    })),
  }, null, 2);
}

export function renderFactsJson(facts: EnrichedFact[]): string {
  return JSON.stringify(facts.map(f => ({
    concept: f.concept,
    label: f.label,
    value: f.numeric_value ?? f.value,
    unit: f.unit,
    decimals: f.decimals,
    period_key: f.period_key,
    dimensions: f.dimensions,
    statement_type: f.statement_type,
    fiscal_year: f.fiscal_year,
    fiscal_period: f.fiscal_period,
  })), null, 2);
}
