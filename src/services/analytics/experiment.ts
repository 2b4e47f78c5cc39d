// Experiment analyzer: rates, significance, lift and a recommendation

import {
  buildGroupStat,
  DEFAULT_CONFIDENCE,
  DEFAULT_LIFT_HALF_WIDTH,
  liftInterval,
  relativeLift,
  testProportions,
} from '../statistics/index.js';
import type { InteractionRecord } from '../events/types.js';
import type { Treatment } from '../triage/types.js';
import type { AnalysisOptions, ExperimentResult, PendingPolicy, Recommendation } from './types.js';

export const DEFAULT_PENDING_POLICY: PendingPolicy = 'count_as_non_conversion';

export type ExperimentRecord = InteractionRecord & { assignedTreatment: Treatment; exclusionReason: null };

const RECOMMENDATIONS = {
  adopt_b:
    'Variant B (Empathetic) significantly outperforms Variant A. Recommend rolling out Empathetic responses.',
  keep_a:
    'Variant A (Clinical) significantly outperforms Variant B. Recommend keeping Clinical responses.',
  continue:
    'No statistically significant difference detected. Continue experiment to gather more data.',
} as const;

function isInExperiment(record: InteractionRecord): record is ExperimentRecord {
  return record.exclusionReason === null && record.assignedTreatment !== null;
}

/**
 * In-experiment subset. Under `count_as_non_conversion` a pending record stays
 * in and counts as a miss (an "as of now" snapshot); under `exclude` it is dropped.
 */
export function selectExperimentRecords(
  records: InteractionRecord[],
  pendingPolicy: PendingPolicy = DEFAULT_PENDING_POLICY
): ExperimentRecord[] {
  return records
    .filter(isInExperiment)
    .filter(record => pendingPolicy === 'count_as_non_conversion' || record.converted !== null);
}

export function countConversions(records: InteractionRecord[]): number {
  return records.filter(record => record.converted === true).length;
}

export function recommend(isSignificant: boolean, lift: number): Recommendation {
  if (isSignificant && lift > 0) {
    return { category: 'adopt_b', message: RECOMMENDATIONS.adopt_b };
  }
  if (isSignificant && lift < 0) {
    return { category: 'keep_a', message: RECOMMENDATIONS.keep_a };
  }
  return { category: 'continue', message: RECOMMENDATIONS.continue };
}

export function analyzeExperiment(records: InteractionRecord[], options: AnalysisOptions = {}): ExperimentResult {
  const pendingPolicy = options.pendingPolicy ?? DEFAULT_PENDING_POLICY;
  const confidence = options.confidence ?? DEFAULT_CONFIDENCE;

  const inExperiment = selectExperimentRecords(records, pendingPolicy);
  const groupA = inExperiment.filter(record => record.assignedTreatment === 'A_CLINICAL');
  const groupB = inExperiment.filter(record => record.assignedTreatment === 'B_EMPATHETIC');

  const variantA = buildGroupStat(countConversions(groupA), groupA.length, confidence);
  const variantB = buildGroupStat(countConversions(groupB), groupB.length, confidence);

  const lift = relativeLift(variantA.rate, variantB.rate);
  const interval = liftInterval(lift, options.liftHalfWidth ?? DEFAULT_LIFT_HALF_WIDTH);
  const significance = testProportions(variantA, variantB);

  return {
    variant_a: variantA,
    variant_b: variantB,
    relative_lift: lift,
    lift_ci_lower: interval.lower,
    lift_ci_upper: interval.upper,
    lift_ci_method: interval.method,
    z_statistic: significance.z_statistic,
    p_value: significance.p_value,
    is_significant: significance.is_significant,
    recommendation: recommend(significance.is_significant, lift),
    pending_policy: pendingPolicy,
  };
}
