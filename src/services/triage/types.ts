// Triage System Types
// Severity buckets, experiment treatments and the per-request decision

export const TREATMENTS = ['A_CLINICAL', 'B_EMPATHETIC'] as const;
export const SEVERITIES = ['mild', 'moderate', 'severe'] as const;

export type Treatment = (typeof TREATMENTS)[number];
export type Severity = (typeof SEVERITIES)[number];

export type ExclusionReason = 'crisis_protocol';

// Uniform source on [0, 1)
export type RandomSource = () => number;

export type ResponseCatalog = Record<Treatment, Record<Severity, string>>;

export interface CrisisConfig {
  keywords: readonly string[];
  sentimentThreshold: number;
}

export type CrisisTrigger =
  | { kind: 'sentiment'; score: number; threshold: number }
  | { kind: 'keyword'; keyword: string };

interface AnalysisBase {
  sentiment_score: number;
  severity: Severity;
}

export interface ExperimentAnalysis extends AnalysisBase {
  is_crisis: false;
  assigned_treatment: Treatment;
  response_text: string;
}

export interface CrisisAnalysis extends AnalysisBase {
  is_crisis: true;
  response_text: '';
  crisis_resources: string;
}

export type AnalysisResult = ExperimentAnalysis | CrisisAnalysis;

export interface TriageOutcome {
  result: AnalysisResult;
  trigger: CrisisTrigger | null;
  elapsed_ms: number;
}
