import type { Context, DurationClass, DurationPeriod, InstantPeriod, ReportingPeriod } from '../core/types.js';
import { daysBetween, formatLongDate, parseDate } from '../core/dates.js';

/**
 * Reporting periods derived from contexts.
 *
 * Classification windows (days between start and end):
 *   annual     350-380
 *   quarterly   85-95
 *   ytd        175-190 (six months), 265-285 (nine months)
 */

const CLASS_LABEL: Record<DurationClass, string> = {
  quarterly: 'Quarterly',
  annual: 'Annual',
  ytd: 'Year-to-Date',
  other: 'Period',
};

export function classifyDuration(days: number): DurationClass {
  if (days >= 350 && days <= 380) return 'annual';
  if (days >= 85 && days <= 95) return 'quarterly';
  if ((days >= 175 && days <= 190) || (days >= 265 && days <= 285)) return 'ytd';
  return 'other';
}

export function instantKey(date: string): string {
  return `instant_${date}`;
}

export function durationKey(start: string, end: string): string {
  return `duration_${start}_${end}`;
}

export interface PeriodIndex {
  /** Most recent first */
  periods: ReportingPeriod[];
  /** context id -> period key, for every context with a parseable instant or duration */
  context_period_map: Map<string, string>;
}

export function periodEnd(period: ReportingPeriod): string {
  return period.type === 'instant' ? period.date : period.end_date;
}

export function buildReportingPeriods(contexts: Iterable<Context>): PeriodIndex {
  const instants = new Map<string, { date: Date; ids: string[] }>();
  const durations = new Map<string, { start: string; end: string; startDate: Date; endDate: Date; ids: string[] }>();
  const contextPeriodMap = new Map<string, string>();

  for (const ctx of contexts) {
    const period = ctx.period;
    if (!period || period.type === 'forever') continue;

    if (period.type === 'instant') {
      const date = parseDate(period.instant);
      if (!date) continue;
      const entry = instants.get(period.instant) ?? { date, ids: [] };
      entry.ids.push(ctx.context_id);
      instants.set(period.instant, entry);
      contextPeriodMap.set(ctx.context_id, instantKey(period.instant));
    } else {
      const startDate = parseDate(period.start_date);
      const endDate = parseDate(period.end_date);
      if (!startDate || !endDate) continue;
      const key = durationKey(period.start_date, period.end_date);
      const entry = durations.get(key) ?? { start: period.start_date, end: period.end_date, startDate, endDate, ids: [] };
      entry.ids.push(ctx.context_id);
      durations.set(key, entry);
      contextPeriodMap.set(ctx.context_id, key);
    }
  }

  const withDates: Array<{ period: ReportingPeriod; sortDate: number }> = [];

  for (const [date, { date: parsed, ids }] of instants) {
    const period: InstantPeriod = {
      type: 'instant',
      key: instantKey(date),
      date,
      label: formatLongDate(parsed),
      context_ids: ids,
    };
    withDates.push({ period, sortDate: parsed.getTime() });
  }

  for (const [key, d] of durations) {
    const days = daysBetween(d.startDate, d.endDate);
    const periodType = classifyDuration(days);
    const period: DurationPeriod = {
      type: 'duration',
      key,
      start_date: d.start,
      end_date: d.end,
      days,
      period_type: periodType,
      label: `${CLASS_LABEL[periodType]}: ${formatLongDate(d.startDate)} to ${formatLongDate(d.endDate)}`,
      context_ids: d.ids,
    };
    withDates.push({ period, sortDate: d.endDate.getTime() });
  }

  withDates.sort((a, b) => b.sortDate - a.sortDate);

  return {
    periods: withDates.map(p => p.period),
    context_period_map: contextPeriodMap,
  };
}
