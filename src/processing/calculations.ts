/**
 * Null-safe arithmetic for values resolved from filings.
 * Helpers return null where plain division would give Infinity or NaN.
 */

export type MaybeNumber = number | null | undefined;

/** numerator / denominator, or null when either side is unusable or the denominator is zero */
export function computeRatio(numerator: MaybeNumber, denominator: MaybeNumber): number | null {
  if (numerator === null || numerator === undefined || !Number.isFinite(numerator)) return null;
  if (denominator === null || denominator === undefined || !Number.isFinite(denominator) || denominator === 0) return null;
  const raw = numerator / denominator;
  return Number.isFinite(raw) ? raw : null;
}

export function roundTo(value: number, places: number): number {
  const factor = Math.pow(10, places);
  return Math.round(value * factor) / factor;
}

