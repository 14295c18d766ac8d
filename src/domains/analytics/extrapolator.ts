// ──────────────────────────────────────────
// Analytics: Current-period extrapolator
// ──────────────────────────────────────────

import { MetricValue } from '../../shared/types';

export type ProjectionPolicy =
  /** Additive metrics: scale the partial value up to a full period. */
  | { mode: 'extrapolate'; earlyFallbackDays: number }
  /** Ratios and averages: report the value of the partial population as is. */
  | { mode: 'direct' }
  /** Leave the in-progress period out of the series. */
  | { mode: 'omit' };

interface Projection {
  value: MetricValue;
  is_provisional: true;
}

/** ceil(raw / max(1, elapsed) × length) */
export function extrapolate(rawValueSoFar: number, elapsedUnits: number, periodLengthUnits: number): number {
  return Math.ceil((rawValueSoFar / Math.max(1, elapsedUnits)) * periodLengthUnits);
}

/**
 * Applies a metric's projection policy to its in-progress value. Returns
 * `null` when the policy omits the current period.
 */
export function projectCurrent(
  rawValueSoFar: MetricValue,
  elapsedUnits: number,
  periodLengthUnits: number,
  policy: ProjectionPolicy
): Projection | null {
  switch (policy.mode) {
    case 'omit':
      return null;
    case 'direct':
      return { value: rawValueSoFar, is_provisional: true };
    case 'extrapolate': {
      if (rawValueSoFar === null) return { value: null, is_provisional: true };
      const early = elapsedUnits <= policy.earlyFallbackDays && elapsedUnits < periodLengthUnits;
      return {
        value: early ? rawValueSoFar : extrapolate(rawValueSoFar, elapsedUnits, periodLengthUnits),
        is_provisional: true,
      };
    }
  }
}
