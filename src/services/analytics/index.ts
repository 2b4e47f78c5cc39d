/**
 * Experiment Analysis Module
 *
 * Reads a snapshot of interaction records and produces the A/B result plus
 * funnel, severity, referral, sentiment, summary and decision-time views. Pure functions;
 * callers supply the records.
 */

export {
  analyzeExperiment,
  recommend,
  selectExperimentRecords,
  countConversions,
  DEFAULT_PENDING_POLICY,
  type ExperimentRecord,
} from './experiment.js';

export {
  getFunnel,
  getSeverityBreakdown,
  getReferralBreakdown,
  getSummary,
  getDecisionTimeStats,
  getSentimentConversionPoints,
} from './segments.js';

export type {
  AnalysisOptions,
  DecisionTimeStat,
  ExperimentResult,
  FunnelCounts,
  PendingPolicy,
  Recommendation,
  RecommendationCategory,
  ReferralSegment,
  SegmentStat,
  SentimentConversionPoint,
  SeveritySegment,
  SummaryStats,
} from './types.js';
