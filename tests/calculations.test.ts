import { describe, it, expect } from 'vitest';
import { computeRatio, roundTo } from '../src/processing/calculations.js';

describe('computeRatio', () => {
  it('divides usable numbers', () => {
    expect(computeRatio(500, 5000)).toBe(0.1);
    expect(computeRatio(-50, 200)).toBe(-0.25);
  });

  it('returns null for a zero or missing denominator', () => {
    expect(computeRatio(500, 0)).toBeNull();
    expect(computeRatio(500, null)).toBeNull();
    expect(computeRatio(500, undefined)).toBeNull();
  });

  it('returns null for a missing or non-finite numerator', () => {
    expect(computeRatio(null, 5000)).toBeNull();
    expect(computeRatio(undefined, 5000)).toBeNull();
    expect(computeRatio(Number.NaN, 5000)).toBeNull();
    expect(computeRatio(Number.POSITIVE_INFINITY, 5000)).toBeNull();
  });

  it('returns null when the quotient overflows', () => {
    expect(computeRatio(Number.MAX_VALUE, 0.5)).toBeNull();
  });
});

describe('roundTo', () => {
  it('rounds to the given number of places', () => {
    expect(roundTo(0.66666, 2)).toBe(0.67);
    expect(roundTo(12.345, 1)).toBe(12.3);
    expect(roundTo(1234.5, 0)).toBe(1235);
  });
});
