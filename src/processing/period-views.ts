import type { DurationPeriod, EntityInfo, InstantPeriod, PeriodView, ReportingPeriod } from '../core/types.js';
import { daysBetween, parseDate } from '../core/dates.js';

/**
 * Period view selection. Each builder proposes zero or more named views;
 * builders run in order and their results are concatenated. When none
 * applies, a generic "Most Recent Periods" view is used.
 */

export type PeriodNature = 'instant' | 'duration';

export interface ViewInputs {
  instants: InstantPeriod[];
  annual: DurationPeriod[];
  quarterly: DurationPeriod[];
  ytd: DurationPeriod[];
  entity: EntityInfo;
}

export type ViewBuilder = (inputs: ViewInputs) => PeriodView[];

const keys = (periods: ReportingPeriod[], n: number): string[] => periods.slice(0, n).map(p => p.key);

function monthDistance(a: number, b: number): number {
  const d = Math.abs(a - b);
  return Math.min(d, 12 - d);
}

export const recentInstantViews: ViewBuilder = ({ instants }) => {
  if (instants.length >= 3) {
    return [{ name: 'Three Recent Periods', description: 'Three most recent reporting dates', period_keys: keys(instants, 3) }];
  }
  if (instants.length === 2) {
    return [{ name: 'Current vs. Previous Period', description: 'Current period compared with the previous one', period_keys: keys(instants, 2) }];
  }
  return [];
};

export const fiscalYearEndInstantViews: ViewBuilder = ({ instants, entity }) => {
  const month = entity.fiscal_year_end_month;
  const day = entity.fiscal_year_end_day;
  if (month === null || day === null) return [];

  const yearEnds = instants.filter(p => {
    const date = parseDate(p.date);
    if (!date) return false;
    return monthDistance(date.getUTCMonth() + 1, month) <= 1 && Math.abs(date.getUTCDate() - day) <= 15;
  });
  if (yearEnds.length < 2) return [];

  const views: PeriodView[] = [];
  if (yearEnds.length >= 3) {
    views.push({ name: 'Three-Year Annual Comparison', description: 'Three fiscal year ends', period_keys: keys(yearEnds, 3) });
  }
  views.push({ name: 'Annual Comparison', description: 'Current fiscal year end compared with the prior one', period_keys: keys(yearEnds, 2) });
  return views;
};

export const annualDurationViews: ViewBuilder = ({ annual }) => {
  const views: PeriodView[] = [];
  if (annual.length >= 3) {
    views.push({ name: 'Three-Year Comparison', description: 'Three most recent fiscal years', period_keys: keys(annual, 3) });
  }
  if (annual.length >= 2) {
    views.push({ name: 'Annual Comparison', description: 'Current fiscal year compared with the prior one', period_keys: keys(annual, 2) });
  }
  return views;
};

export const quarterlyViews: ViewBuilder = ({ quarterly }) => {
  if (quarterly.length < 2) return [];
  const views: PeriodView[] = [];

  const latest = quarterly[0];
  const latestEnd = parseDate(latest.end_date);
  const priorYear = latestEnd
    ? quarterly.slice(1).find(q => {
      const end = parseDate(q.end_date);
      if (!end) return false;
      const gap = daysBetween(end, latestEnd);
      return gap >= 350 && gap <= 380;
    })
    : undefined;
  if (priorYear) {
    views.push({
      name: 'Current Quarter vs. Prior Year Quarter',
      description: 'Latest quarter compared with the same quarter a year earlier',
      period_keys: [latest.key, priorYear.key],
    });
  }

  views.push({ name: 'Three Recent Quarters', description: 'Most recent quarters in sequence', period_keys: keys(quarterly, 3) });
  return views;
};

export const ytdViews: ViewBuilder = ({ ytd }) => {
  const views: PeriodView[] = [];
  if (ytd.length >= 3) {
    views.push({ name: 'Three-Year YTD Comparison', description: 'Year-to-date periods across three years', period_keys: keys(ytd, 3) });
  }
  if (ytd.length >= 2) {
    views.push({ name: 'Year-to-Date Comparison', description: 'Current year-to-date compared with the prior year', period_keys: keys(ytd, 2) });
  }
  return views;
};

export const mixedYtdQuarterlyViews: ViewBuilder = ({ ytd, quarterly }) => {
  if (ytd.length === 0) return [];
  const periodKeys = [ytd[0].key, ...keys(quarterly, 4)].slice(0, 5);
  if (periodKeys.length < 2) return [];
  return [{ name: 'YTD and Quarterly Breakdown', description: 'Latest year-to-date period with recent quarters', period_keys: periodKeys }];
};

export const INSTANT_VIEW_BUILDERS: ViewBuilder[] = [recentInstantViews, fiscalYearEndInstantViews];

export const DURATION_VIEW_BUILDERS: ViewBuilder[] = [
  annualDurationViews,
  quarterlyViews,
  ytdViews,
  mixedYtdQuarterlyViews,
];

export function getPeriodViews(nature: PeriodNature, periods: ReportingPeriod[], entity: EntityInfo): PeriodView[] {
  if (periods.length === 0) return [];

  const instants = periods.filter((p): p is InstantPeriod => p.type === 'instant');
  const durations = periods.filter((p): p is DurationPeriod => p.type === 'duration');
  const inputs: ViewInputs = {
    instants,
    annual: durations.filter(p => p.period_type === 'annual'),
    quarterly: durations.filter(p => p.period_type === 'quarterly'),
    ytd: durations.filter(p => p.period_type === 'ytd'),
    entity,
  };

  const builders = nature === 'instant' ? INSTANT_VIEW_BUILDERS : DURATION_VIEW_BUILDERS;
  const views = builders.flatMap(build => build(inputs));
  if (views.length > 0) return views;

  const ofNature: ReportingPeriod[] = nature === 'instant' ? instants : durations;
  const pool = ofNature.length > 0 ? ofNature : periods;
  return [{ name: 'Most Recent Periods', description: 'Most recent available periods', period_keys: keys(pool, 3) }];
}
