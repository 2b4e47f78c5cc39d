// Aggregation views over the interaction population

import jStat from 'jstat';
import type { InteractionRecord } from '../events/types.js';
import { SEVERITIES, TREATMENTS } from '../triage/types.js';
import { countConversions, DEFAULT_PENDING_POLICY, selectExperimentRecords } from './experiment.js';
import type {
  AnalysisOptions,
  DecisionTimeStat,
  FunnelCounts,
  ReferralSegment,
  SegmentStat,
  SentimentConversionPoint,
  SeveritySegment,
  SummaryStats,
} from './types.js';

function segmentStat(records: InteractionRecord[]): SegmentStat {
  const conversions = countConversions(records);
  return {
    sessions: records.length,
    conversions,
    conversion_rate: records.length > 0 ? conversions / records.length : 0,
  };
}

// Full population, excluded rows included
export function getFunnel(records: InteractionRecord[]): FunnelCounts {
  return {
    total_sessions: records.length,
    experiment_sessions: records.filter(record => record.exclusionReason === null).length,
    conversions: countConversions(records),
    crisis_excluded: records.filter(record => record.exclusionReason === 'crisis_protocol').length,
  };
}

// Every severity × treatment cell, empty ones included
export function getSeverityBreakdown(records: InteractionRecord[], options: AnalysisOptions = {}): SeveritySegment[] {
  const inExperiment = selectExperimentRecords(records, options.pendingPolicy);

  return SEVERITIES.flatMap(severity =>
    TREATMENTS.map(treatment => ({
      severity,
      treatment,
      ...segmentStat(
        inExperiment.filter(record => record.severity === severity && record.assignedTreatment === treatment)
      ),
    }))
  );
}

export function getReferralBreakdown(records: InteractionRecord[], options: AnalysisOptions = {}): ReferralSegment[] {
  const groups = new Map<string, InteractionRecord[]>();
  for (const record of selectExperimentRecords(records, options.pendingPolicy)) {
    const group = groups.get(record.referralSource);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.referralSource, [record]);
    }
  }

  return Array.from(groups.entries())
    .map(([source, group]) => ({ referral_source: source, ...segmentStat(group) }))
    .sort((a, b) => b.sessions - a.sessions || a.referral_source.localeCompare(b.referral_source));
}

export function getSummary(records: InteractionRecord[], options: AnalysisOptions = {}): SummaryStats {
  const inExperiment = selectExperimentRecords(records, options.pendingPolicy ?? DEFAULT_PENDING_POLICY);
  const overall = segmentStat(inExperiment);
  const variantA = segmentStat(inExperiment.filter(record => record.assignedTreatment === 'A_CLINICAL'));
  const variantB = segmentStat(inExperiment.filter(record => record.assignedTreatment === 'B_EMPATHETIC'));

  return {
    total_sessions: records.length,
    total_conversions: overall.conversions,
    overall_rate: overall.conversion_rate,
    variant_a_rate: variantA.conversion_rate,
    variant_b_rate: variantB.conversion_rate,
  };
}

// One point per in-experiment session; a pending session kept by the policy plots as not converted
export function getSentimentConversionPoints(
  records: InteractionRecord[],
  options: AnalysisOptions = {}
): SentimentConversionPoint[] {
  return selectExperimentRecords(records, options.pendingPolicy).map(record => ({
    sentiment_score: record.sentimentScore,
    converted: record.converted === true,
    treatment: record.assignedTreatment,
    severity: record.severity,
  }));
}

// Decided in-experiment sessions only
export function getDecisionTimeStats(records: InteractionRecord[]): DecisionTimeStat[] {
  const decided = selectExperimentRecords(records, 'exclude');

  return TREATMENTS.map(treatment => {
    const latencies = decided
      .filter(record => record.assignedTreatment === treatment)
      .map(record => record.decisionLatencyMs)
      .filter((value): value is number => value !== null);

    if (latencies.length === 0) {
      return { treatment, decided_sessions: 0, mean_ms: 0, median_ms: 0 };
    }

    return {
      treatment,
      decided_sessions: latencies.length,
      mean_ms: jStat.mean(latencies),
      median_ms: jStat.median(latencies),
    };
  });
}
