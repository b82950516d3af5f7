import type { LineItemValue } from '../core/types.js';

/**
 * Shared formatting utilities for terminal output renderers.
 */

const ANSI = /\x1b\[[0-9;]*m/g;

export function visibleLength(str: string): number {
  return str.replace(ANSI, '').length;
}

/** Pad a string to a minimum length, accounting for ANSI escape sequences */
export function padRight(str: string, len: number): string {
  return str + ' '.repeat(Math.max(0, len - visibleLength(str)));
}

export function padLeft(str: string, len: number): string {
  return ' '.repeat(Math.max(0, len - visibleLength(str))) + str;
}

/** Escape a value for CSV output (quote if it contains commas or quotes) */
export function csvEscape(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Thousands-separated, negatives in parentheses. Positive `decimals` sets the
 * fraction digits (at most 4); otherwise whole numbers print bare and
 * fractional ones get two places.
 */
export function formatValue(value: LineItemValue | null | undefined, decimals?: number): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;

  const places = decimals !== undefined && decimals > 0
    ? Math.min(decimals, 4)
    : Number.isInteger(value) ? 0 : 2;
  const abs = Math.abs(value).toLocaleString('en-US', {
    minimumFractionDigits: places,
    maximumFractionDigits: places,
  });
  return value < 0 ? `(${abs})` : abs;
}

/** Compact magnitude: 1.23B, 45.60M, 7.00K */
export function formatCompact(value: number): string {
  const abs = Math.abs(value);
  const sign = value < 0 ? '-' : '';
  if (abs >= 1e12) return `${sign}${(abs / 1e12).toFixed(2)}T`;
  if (abs >= 1e9) return `${sign}${(abs / 1e9).toFixed(2)}B`;
  if (abs >= 1e6) return `${sign}${(abs / 1e6).toFixed(2)}M`;
  if (abs >= 1e3) return `${sign}${(abs / 1e3).toFixed(2)}K`;
  return `${sign}${abs.toFixed(0)}`;
}
