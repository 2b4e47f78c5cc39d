/**
 * Statistics Service Module
 *
 * Frequentist A/B analysis for conversion experiments:
 * - Wilson score confidence intervals for conversion rates
 * - One-sided pooled two-proportion z-test
 * - Relative lift with an approximate fixed-band interval
 */

export { estimateRate, buildGroupStat, DEFAULT_CONFIDENCE } from './rate.js';

export {
  testProportions,
  relativeLift,
  liftInterval,
  SIGNIFICANCE_LEVEL,
  DEFAULT_LIFT_HALF_WIDTH,
} from './significance.js';

export { standardNormalCdf, standardNormalQuantile, criticalValue } from './normal.js';

export type { RateEstimate, GroupStat, GroupCounts, SignificanceResult, LiftInterval } from './types.js';
