import { describe, it, expect } from 'vitest';
import type { LineItem, StatementExtraction } from '../src/core/types.js';
import { XbrlDocument } from '../src/core/xbrl-document.js';
import { ConceptMapper, MappingStore } from '../src/processing/standardization.js';
import {
  type StitchPeriod,
  StatementStitcher,
  parsePeriodKey,
  resolvePeriodType,
  selectPeriods,
  stitchedToTable,
} from '../src/processing/stitching.js';
import { sampleFiling } from './fixtures.js';

const FY = (y: number): string => `duration_${y}-01-01_${y}-12-31`;

function makeItem(overrides: Partial<LineItem> = {}): LineItem {
  return {
    concept: 'us-gaap_Revenues',
    name: 'Revenues',
    label: 'Revenue',
    level: 1,
    is_abstract: false,
    values: {},
    decimals: {},
    children: [],
    has_values: true,
    preferred_label: null,
    dimension: null,
    is_dimension_row: false,
    ...overrides,
  };
}

function makeExtraction(periodKeys: string[], data: LineItem[], labels: Record<string, string> = {}): StatementExtraction {
  return {
    role: 'http://example.com/role/IncomeStatement',
    definition: 'Income Statement',
    statement_type: 'IncomeStatement',
    periods: Object.fromEntries(periodKeys.map(k => [k, { label: labels[k] ?? '' }])),
    data,
  };
}

function periods(...keys: string[]): StitchPeriod[] {
  return keys.flatMap(key => {
    const parsed = parsePeriodKey(key);
    return parsed ? [{ ...parsed, label: key }] : [];
  });
}

const newer = makeExtraction([FY(2024), FY(2023)], [
  makeItem({ values: { [FY(2024)]: 100, [FY(2023)]: 90 }, decimals: { [FY(2024)]: -6, [FY(2023)]: -6 } }),
  makeItem({ concept: 'test_SegmentGain', label: 'Segment gain', values: { [FY(2024)]: 5 } }),
], { [FY(2024)]: 'Year ended Dec 31, 2024', [FY(2023)]: 'Year ended Dec 31, 2023' });

const older = makeExtraction([FY(2023), FY(2022)], [
  makeItem({ values: { [FY(2023)]: 90, [FY(2022)]: 80 } }),
  makeItem({ concept: 'test_Legacy', label: 'Legacy item', values: { [FY(2022)]: 7 } }),
], { [FY(2023)]: 'Fiscal 2023', [FY(2022)]: 'Year ended Dec 31, 2022' });

describe('parsePeriodKey', () => {
  it('reads instant and duration keys', () => {
    const instant = parsePeriodKey('instant_2024-12-31');
    expect(instant?.kind).toBe('instant');
    expect(instant?.days).toBeNull();
    expect(instant?.end.toISOString()).toBe('2024-12-31T00:00:00.000Z');
    expect(parsePeriodKey(FY(2023))?.days).toBe(364);
  });

  it('rejects malformed keys', () => {
    expect(parsePeriodKey('instant_2024-13-01')).toBeNull();
    expect(parsePeriodKey('duration_2024-01-01')).toBeNull();
    expect(parsePeriodKey('forever')).toBeNull();
  });
});

describe('resolvePeriodType', () => {
  it('accepts keys and display names', () => {
    expect(resolvePeriodType('ANNUAL_COMPARISON')).toBe('ANNUAL_COMPARISON');
    expect(resolvePeriodType('Three Recent Quarters')).toBe('THREE_QUARTERS');
  });

  it('defaults to recent periods', () => {
    expect(resolvePeriodType('Someday')).toBe('RECENT_PERIODS');
    expect(resolvePeriodType('toString')).toBe('RECENT_PERIODS');
  });
});

describe('selectPeriods', () => {
  const all = periods(
    'instant_2024-12-31',
    'duration_2024-10-01_2024-12-31',
    FY(2024),
    'instant_2024-06-30',
    'duration_2024-07-01_2024-09-30',
    'instant_2023-12-31',
    FY(2023),
    'instant_2022-12-31',
  );

  it('takes the most recent periods of any kind', () => {
    expect(selectPeriods(all, 'RECENT_PERIODS', 3).map(p => p.key)).toEqual([
      'instant_2024-12-31',
      'duration_2024-10-01_2024-12-31',
      FY(2024),
    ]);
  });

  it('keeps one instant per calendar year for three-year comparisons', () => {
    expect(selectPeriods(all, 'THREE_YEAR_COMPARISON', 3).map(p => p.key)).toEqual([
      'instant_2024-12-31',
      'instant_2023-12-31',
      'instant_2022-12-31',
    ]);
  });

  it('keeps quarter-length durations for quarterly policies', () => {
    expect(selectPeriods(all, 'THREE_QUARTERS', 3).map(p => p.key)).toEqual([
      'duration_2024-10-01_2024-12-31',
      'duration_2024-07-01_2024-09-30',
    ]);
  });

  it('keeps year-length durations for annual policies', () => {
    expect(selectPeriods(all, 'ANNUAL_COMPARISON', 3).map(p => p.key)).toEqual([FY(2024), FY(2023)]);
    expect(selectPeriods(all, 'RECENT_YEARS', 1).map(p => p.key)).toEqual([FY(2024)]);
  });
});

describe('StatementStitcher.stitch', () => {
  const stitcher = new StatementStitcher();

  it('covers the union of every filing\'s periods, most recent first', () => {
    const stitched = stitcher.stitch([newer, older], 'RECENT_PERIODS', 5, false);
    expect(stitched.periods).toEqual([
      { key: FY(2024), label: 'Year ended Dec 31, 2024' },
      { key: FY(2023), label: 'Year ended Dec 31, 2023' },
      { key: FY(2022), label: 'Year ended Dec 31, 2022' },
    ]);
    expect(stitched.statement_data.find(r => r.label === 'Revenue')?.values).toEqual({
      [FY(2024)]: 100,
      [FY(2023)]: 90,
      [FY(2022)]: 80,
    });
  });

  it('leaves periods a row was never reported for empty', () => {
    const rows = stitcher.stitch([newer, older], 'RECENT_PERIODS', 5, false).statement_data;
    expect(rows.map(r => [r.label, Object.keys(r.values)])).toEqual([
      ['Legacy item', [FY(2022)]],
      ['Revenue', [FY(2024), FY(2023), FY(2022)]],
      ['Segment gain', [FY(2024)]],
    ]);
  });

  it('drops rows with no value in the selected periods', () => {
    const rows = stitcher.stitch([newer, older], 'RECENT_PERIODS', 2, false).statement_data;
    expect(rows.map(r => r.label)).toEqual(['Revenue', 'Segment gain']);
    expect(rows[0].values).toEqual({ [FY(2024)]: 100, [FY(2023)]: 90 });
  });

  it('copies decimals and defaults missing ones to zero', () => {
    const revenue = stitcher.stitch([newer, older], 'RECENT_PERIODS', 3, false).statement_data.find(r => r.label === 'Revenue');
    expect(revenue?.decimals).toEqual({ [FY(2024)]: -6, [FY(2023)]: 0, [FY(2022)]: 0 });
  });

  it('merges by label unless asked to key by concept too', () => {
    const a = makeExtraction([FY(2024)], [makeItem({ concept: 'test_OtherA', label: 'Other', values: { [FY(2024)]: 1 } })]);
    const b = makeExtraction([FY(2023)], [makeItem({ concept: 'test_OtherB', label: 'Other', values: { [FY(2023)]: 2 } })]);

    const byLabel = stitcher.stitch([a, b], 'RECENT_PERIODS', 3, false).statement_data;
    expect(byLabel).toHaveLength(1);
    expect(byLabel[0].concept).toBe('test_OtherA');
    expect(byLabel[0].values).toEqual({ [FY(2024)]: 1, [FY(2023)]: 2 });

    const byConcept = stitcher.stitch([a, b], 'RECENT_PERIODS', 3, false, { keyBy: 'concept' }).statement_data;
    expect(byConcept.map(r => r.concept)).toEqual(['test_OtherA', 'test_OtherB']);
  });

  it('orders by level then label, or keeps first-seen order', () => {
    const statement = makeExtraction([FY(2024)], [
      makeItem({ concept: 'test_Root', label: 'Income', level: 0, is_abstract: true, children: ['us-gaap_Revenues'] }),
      makeItem({ concept: 'test_Z', label: 'Zeta', level: 2, values: { [FY(2024)]: 1 } }),
      makeItem({ concept: 'test_A', label: 'Alpha', level: 2, values: { [FY(2024)]: 2 } }),
      makeItem({ concept: 'test_M', label: 'Total mid', level: 1, values: { [FY(2024)]: 3 } }),
    ]);

    const byLevel = stitcher.stitch([statement], 'RECENT_PERIODS', 3, false).statement_data;
    expect(byLevel.map(r => r.label)).toEqual(['Income', 'Total mid', 'Alpha', 'Zeta']);
    expect(byLevel[0].has_values).toBe(false);
    expect(byLevel[1].is_total).toBe(true);

    const asPresented = stitcher.stitch([statement], 'RECENT_PERIODS', 3, false, { order: 'presentation' }).statement_data;
    expect(asPresented.map(r => r.label)).toEqual(['Income', 'Zeta', 'Alpha', 'Total mid']);
  });

  it('skips bracketed structure rows and childless abstracts', () => {
    const statement = makeExtraction([FY(2024)], [
      makeItem({ concept: 'test_Table', label: 'Segments [Table]', values: { [FY(2024)]: 9 } }),
      makeItem({ concept: 'test_Heading', label: 'Heading', is_abstract: true }),
      makeItem({ values: { [FY(2024)]: 100 } }),
    ]);
    expect(stitcher.stitch([statement], 'RECENT_PERIODS', 3, false).statement_data.map(r => r.label)).toEqual(['Revenue']);
  });

  it('standardizes labels with the given mapper', () => {
    const mapper = new ConceptMapper(new MappingStore({ Revenue: ['test_Sales'] }), () => null);
    const statement = makeExtraction([FY(2024)], [
      makeItem({ concept: 'test_Sales', label: 'Net sales', values: { [FY(2024)]: 100 } }),
    ]);
    const rows = new StatementStitcher(mapper).stitch([statement], 'RECENT_PERIODS', 3, true).statement_data;
    expect(rows.map(r => r.label)).toEqual(['Revenue']);
  });

  it('keeps distinct labels for periods that end on the same date', () => {
    const quarter = 'duration_2024-04-01_2024-06-30';
    const ytd = 'duration_2024-01-01_2024-06-30';
    const statement = makeExtraction([quarter, ytd], [
      makeItem({ values: { [quarter]: 40, [ytd]: 75 } }),
    ], {
      [quarter]: 'Quarterly: April 1, 2024 to June 30, 2024',
      [ytd]: 'YTD: January 1, 2024 to June 30, 2024',
    });

    const stitched = stitcher.stitch([statement], 'RECENT_PERIODS', 3, false);
    expect(stitched.periods).toEqual([
      { key: quarter, label: 'Quarterly: April 1, 2024 to June 30, 2024' },
      { key: ytd, label: 'YTD: January 1, 2024 to June 30, 2024' },
    ]);
    expect(new Set(stitchedToTable(stitched).columns).size).toBe(2);
  });

  it('falls back to the end date for unlabelled periods', () => {
    const statement = makeExtraction(['instant_2024-06-30'], [makeItem({ values: { 'instant_2024-06-30': 1 } })]);
    expect(stitcher.stitch([statement], 'RECENT_PERIODS', 3, false).periods).toEqual([
      { key: 'instant_2024-06-30', label: 'Jun 30, 2024' },
    ]);
  });

  it('returns an empty statement for no inputs', () => {
    expect(stitcher.stitch([], 'RECENT_PERIODS', 3, false)).toEqual({ periods: [], statement_data: [] });
  });
});

describe('stitching parsed filings', () => {
  const docs = [XbrlDocument.fromContents(sampleFiling(2024)), XbrlDocument.fromContents(sampleFiling(2023))];

  it('stitches three years of standardized income statement rows', () => {
    const stitched = XbrlDocument.stitchStatements(docs, 'IncomeStatement');
    expect(stitched.periods.map(p => p.key)).toEqual([FY(2024), FY(2023), FY(2022)]);
    expect(stitched.statement_data.map(r => [r.label, r.values])).toEqual([
      ['Net Income', { [FY(2024)]: 500, [FY(2023)]: 300, [FY(2022)]: 100 }],
      ['Revenue', { [FY(2024)]: 5000, [FY(2023)]: 4000, [FY(2022)]: 3000 }],
    ]);
  });

  it('limits balance sheets to one year end per year', () => {
    const stitched = XbrlDocument.stitchStatements(docs, 'BalanceSheet', 'THREE_YEAR_COMPARISON', 2);
    expect(stitched.periods.map(p => p.key)).toEqual(['instant_2024-12-31', 'instant_2023-12-31']);
    expect(stitched.statement_data.find(r => r.label === 'Total Assets')?.values).toEqual({
      'instant_2024-12-31': 1000,
      'instant_2023-12-31': 900,
    });
  });

  it('is empty when no filing has the statement', () => {
    expect(XbrlDocument.stitchStatements(docs, 'StatementOfEquity')).toEqual({ periods: [], statement_data: [] });
  });
});

describe('stitchedToTable', () => {
  it('lays rows out under period label columns', () => {
    const stitched = new StatementStitcher().stitch([newer, older], 'RECENT_PERIODS', 3, false);
    const table = stitchedToTable(stitched);
    expect(table.columns).toEqual(['Year ended Dec 31, 2024', 'Year ended Dec 31, 2023', 'Year ended Dec 31, 2022']);
    expect(table.rows[0]).toEqual({ label: 'Legacy item', level: 1, cells: [null, null, 7] });
  });
});
