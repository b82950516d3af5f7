import { describe, it, expect } from 'vitest';
import type { Context, ContextPeriod } from '../src/core/types.js';
import {
  buildReportingPeriods,
  classifyDuration,
  durationKey,
  instantKey,
  periodEnd,
} from '../src/processing/reporting-periods.js';

function makeContext(id: string, period: ContextPeriod | null): Context {
  return { context_id: id, entity: { scheme: 'http://www.sec.gov/CIK', identifier: '0000123456' }, period, dimensions: {} };
}

describe('classifyDuration', () => {
  it('treats 350-380 days as annual', () => {
    for (const days of [350, 364, 365, 366, 370, 380]) {
      expect(classifyDuration(days)).toBe('annual');
    }
  });

  it('treats 85-95 days as quarterly', () => {
    expect(classifyDuration(85)).toBe('quarterly');
    expect(classifyDuration(90)).toBe('quarterly');
    expect(classifyDuration(95)).toBe('quarterly');
  });

  it('treats six and nine month spans as year-to-date', () => {
    expect(classifyDuration(181)).toBe('ytd');
    expect(classifyDuration(273)).toBe('ytd');
  });

  it('falls back to other outside every window', () => {
    for (const days of [84, 96, 200, 349, 381, 730]) {
      expect(classifyDuration(days)).toBe('other');
    }
  });
});

describe('buildReportingPeriods', () => {
  const contexts = [
    makeContext('D2024', { type: 'duration', start_date: '2024-01-01', end_date: '2024-12-31' }),
    makeContext('I2024', { type: 'instant', instant: '2024-12-31' }),
    makeContext('I2023', { type: 'instant', instant: '2023-12-31' }),
    makeContext('Q4', { type: 'duration', start_date: '2024-10-01', end_date: '2024-12-31' }),
    makeContext('I2024_Seg', { type: 'instant', instant: '2024-12-31' }),
    makeContext('Forever', { type: 'forever' }),
    makeContext('Bad', { type: 'instant', instant: '2024-02-30' }),
    makeContext('None', null),
  ];
  const { periods, context_period_map } = buildReportingPeriods(contexts);

  it('produces one period per distinct date range with stable keys', () => {
    expect(periods.map(p => p.key)).toEqual([
      'instant_2024-12-31',
      'duration_2024-01-01_2024-12-31',
      'duration_2024-10-01_2024-12-31',
      'instant_2023-12-31',
    ]);
    expect(new Set(periods.map(p => p.key)).size).toBe(periods.length);
  });

  it('collects every context that shares a period', () => {
    expect(periods[0].context_ids).toEqual(['I2024', 'I2024_Seg']);
  });

  it('maps contexts to period keys and skips forever, unparseable and missing periods', () => {
    expect(context_period_map.get('D2024')).toBe('duration_2024-01-01_2024-12-31');
    expect(context_period_map.get('I2024_Seg')).toBe('instant_2024-12-31');
    expect(context_period_map.has('Forever')).toBe(false);
    expect(context_period_map.has('Bad')).toBe(false);
    expect(context_period_map.has('None')).toBe(false);
    expect(context_period_map.size).toBe(5);
  });

  it('labels instants by date and durations by class and range', () => {
    expect(periods[0].label).toBe('December 31, 2024');
    expect(periods[1].label).toBe('Annual: January 1, 2024 to December 31, 2024');
    expect(periods[2].label).toBe('Quarterly: October 1, 2024 to December 31, 2024');
  });

  it('records duration days and class', () => {
    const annual = periods[1];
    expect(annual.type).toBe('duration');
    if (annual.type === 'duration') {
      expect(annual.days).toBe(365);
      expect(annual.period_type).toBe('annual');
    }
    const quarter = periods[2];
    if (quarter.type === 'duration') {
      expect(quarter.days).toBe(91);
      expect(quarter.period_type).toBe('quarterly');
    }
  });

  it('reports the end date of either kind', () => {
    expect(periods.map(periodEnd)).toEqual(['2024-12-31', '2024-12-31', '2024-12-31', '2023-12-31']);
  });
});

describe('period keys', () => {
  it('formats instant and duration keys', () => {
    expect(instantKey('2024-06-30')).toBe('instant_2024-06-30');
    expect(durationKey('2024-01-01', '2024-06-30')).toBe('duration_2024-01-01_2024-06-30');
  });
});
