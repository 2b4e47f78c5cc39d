// One-sided two-proportion z-test and relative lift

import { standardNormalCdf } from './normal.js';
import type { GroupCounts, LiftInterval, SignificanceResult } from './types.js';

export const SIGNIFICANCE_LEVEL = 0.05;
export const DEFAULT_LIFT_HALF_WIDTH = 0.15;

const NO_EVIDENCE: SignificanceResult = { z_statistic: 0, p_value: 1, is_significant: false };

// H1: B's true rate exceeds A's. Pooled standard error.
export function testProportions(a: GroupCounts, b: GroupCounts): SignificanceResult {
  if (a.sessions === 0 || b.sessions === 0) {
    return { ...NO_EVIDENCE };
  }

  const rateA = a.conversions / a.sessions;
  const rateB = b.conversions / b.sessions;
  const pooled = (a.conversions + b.conversions) / (a.sessions + b.sessions);
  const se = Math.sqrt(pooled * (1 - pooled) * (1 / a.sessions + 1 / b.sessions));

  if (se === 0) {
    return { ...NO_EVIDENCE };
  }

  const z = (rateB - rateA) / se;
  const pValue = Math.min(1, Math.max(0, 1 - standardNormalCdf(z)));

  return {
    z_statistic: z,
    p_value: pValue,
    is_significant: pValue < SIGNIFICANCE_LEVEL,
  };
}

export function relativeLift(rateA: number, rateB: number): number {
  if (rateA === 0) return 0;
  return (rateB - rateA) / rateA;
}

/**
 * Approximate lift interval: a fixed ± band around the point estimate.
 * This is not a bootstrap or delta-method interval and carries no coverage
 * guarantee; `method` marks it as such in every result.
 */
export function liftInterval(lift: number, halfWidth: number = DEFAULT_LIFT_HALF_WIDTH): LiftInterval {
  return {
    lower: lift - halfWidth,
    upper: lift + halfWidth,
    method: 'fixed_band',
  };
}
