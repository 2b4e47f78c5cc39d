// Conversion rate with a Wilson score interval

import { AppError } from '../../utils/errors.js';
import { criticalValue } from './normal.js';
import type { GroupStat, RateEstimate } from './types.js';

export const DEFAULT_CONFIDENCE = 0.95;

function assertCounts(conversions: number, trials: number): void {
  if (!Number.isInteger(conversions) || !Number.isInteger(trials)) {
    throw AppError.validationError('Conversions and trials must be integers', { conversions, trials });
  }
  if (trials < 0 || conversions < 0 || conversions > trials) {
    throw AppError.validationError('Conversions must be between 0 and trials', { conversions, trials });
  }
}

function assertConfidence(confidence: number): void {
  if (!(confidence > 0 && confidence < 1)) {
    throw AppError.validationError('Confidence level must be strictly between 0 and 1', { confidence });
  }
}

/**
 * Wilson score interval for k successes in n trials. Stays inside [0, 1] and
 * behaves near rates of 0 or 1, unlike the normal approximation.
 * An empty group yields all zeros rather than an error.
 */
export function estimateRate(
  conversions: number,
  trials: number,
  confidence: number = DEFAULT_CONFIDENCE
): RateEstimate {
  assertCounts(conversions, trials);
  assertConfidence(confidence);

  if (trials === 0) {
    return { rate: 0, ci_lower: 0, ci_upper: 0 };
  }

  const n = trials;
  const p = conversions / n;
  const z = criticalValue(confidence);
  const z2 = z * z;

  const center = (conversions + z2 / 2) / (n + z2);
  const halfWidth = (z * Math.sqrt((p * (1 - p)) / n + z2 / (4 * n * n))) / (1 + z2 / n);

  // Clamp against floating-point drift at k = 0 and k = n
  return {
    rate: p,
    ci_lower: Math.max(0, Math.min(p, center - halfWidth)),
    ci_upper: Math.min(1, Math.max(p, center + halfWidth)),
  };
}

export function buildGroupStat(
  conversions: number,
  sessions: number,
  confidence: number = DEFAULT_CONFIDENCE
): GroupStat {
  return {
    sessions,
    conversions,
    ...estimateRate(conversions, sessions, confidence),
  };
}
