// Experiment Analysis Types

import type { PendingPolicy } from '../../env.js';
import type { GroupStat } from '../statistics/types.js';
import type { Severity, Treatment } from '../triage/types.js';

export type { PendingPolicy };

export interface AnalysisOptions {
  pendingPolicy?: PendingPolicy;
  confidence?: number;
  liftHalfWidth?: number;
}

export type RecommendationCategory = 'adopt_b' | 'keep_a' | 'continue';

export interface Recommendation {
  category: RecommendationCategory;
  message: string;
}

export interface ExperimentResult {
  variant_a: GroupStat;
  variant_b: GroupStat;
  relative_lift: number;
  lift_ci_lower: number;
  lift_ci_upper: number;
  lift_ci_method: 'fixed_band';
  z_statistic: number;
  p_value: number;
  is_significant: boolean;
  recommendation: Recommendation;
  pending_policy: PendingPolicy;
}

export interface FunnelCounts {
  total_sessions: number;
  experiment_sessions: number;
  conversions: number;
  crisis_excluded: number;
}

export interface SegmentStat {
  sessions: number;
  conversions: number;
  conversion_rate: number;
}

export interface SeveritySegment extends SegmentStat {
  severity: Severity;
  treatment: Treatment;
}

export interface ReferralSegment extends SegmentStat {
  referral_source: string;
}

export interface SummaryStats {
  total_sessions: number;
  total_conversions: number;
  overall_rate: number;
  variant_a_rate: number;
  variant_b_rate: number;
}

export interface DecisionTimeStat {
  treatment: Treatment;
  decided_sessions: number;
  mean_ms: number;
  median_ms: number;
}

export interface SentimentConversionPoint {
  sentiment_score: number;
  converted: boolean;
  treatment: Treatment;
  severity: Severity;
}
