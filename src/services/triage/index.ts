// Triage System Entry Point
// Scores the text, then runs Stage A (signals) and Stage B (rules) in a single pass

import { AppError } from '../../utils/errors.js';
import type { SentimentScorer } from '../sentiment.js';
import { classifySeverity, detectCrisisTrigger, normalizeCrisisKeywords } from './signals.js';
import { assertResponseCatalog, createTreatmentAssigner, selectResponse } from './rules.js';
import { CRISIS_RESOURCES, DEFAULT_RESPONSES } from './responses.js';
import type {
  AnalysisResult,
  CrisisConfig,
  CrisisTrigger,
  RandomSource,
  ResponseCatalog,
  Treatment,
  TriageOutcome,
} from './types.js';

export interface TriageEngineOptions {
  scorer: SentimentScorer;
  crisis: CrisisConfig;
  random?: RandomSource;
  responses?: ResponseCatalog;
}

/**
 * Request-scoped triage. Holds only immutable configuration and the injected
 * scorer and random source, so concurrent calls need no coordination.
 */
export class TriageEngine {
  private readonly scorer: SentimentScorer;
  private readonly crisis: CrisisConfig;
  private readonly responses: ResponseCatalog;
  private readonly assignTreatment: () => Treatment;

  constructor(options: TriageEngineOptions) {
    const responses = options.responses ?? DEFAULT_RESPONSES;
    assertResponseCatalog(responses);

    this.scorer = options.scorer;
    this.crisis = { ...options.crisis, keywords: normalizeCrisisKeywords(options.crisis.keywords) };
    this.responses = responses;
    this.assignTreatment = createTreatmentAssigner(options.random);
  }

  decide(text: string, score: number): AnalysisResult {
    return this.evaluate(text, score).result;
  }

  async analyze(text: string): Promise<TriageOutcome> {
    const start = performance.now();

    const score = await this.scorer.score(text);
    if (!Number.isFinite(score) || score < -1 || score > 1) {
      throw AppError.internal('Sentiment scorer returned an out-of-range score', { score });
    }

    const { result, trigger } = this.evaluate(text, score);

    return {
      result,
      trigger,
      elapsed_ms: Math.round(performance.now() - start),
    };
  }

  private evaluate(text: string, score: number): { result: AnalysisResult; trigger: CrisisTrigger | null } {
    const severity = classifySeverity(score);
    const trigger = detectCrisisTrigger(text, score, this.crisis);

    if (trigger) {
      return {
        trigger,
        result: {
          sentiment_score: score,
          severity,
          is_crisis: true,
          response_text: '',
          crisis_resources: CRISIS_RESOURCES,
        },
      };
    }

    const treatment = this.assignTreatment();
    return {
      trigger: null,
      result: {
        sentiment_score: score,
        severity,
        is_crisis: false,
        assigned_treatment: treatment,
        response_text: selectResponse(this.responses, treatment, severity),
      },
    };
  }
}

export { classifySeverity, detectCrisis, detectCrisisTrigger, findCrisisKeyword, isBelowCrisisThreshold, loadCrisisKeywords, normalizeCrisisKeywords, parseCrisisKeywords } from './signals.js';
export { assertResponseCatalog, createTreatmentAssigner, selectResponse, MIN_RESPONSE_LENGTH } from './rules.js';
export { CRISIS_RESOURCES, DEFAULT_RESPONSES } from './responses.js';

// Re-export types for convenience
export type {
  AnalysisResult,
  CrisisAnalysis,
  CrisisConfig,
  CrisisTrigger,
  ExclusionReason,
  ExperimentAnalysis,
  RandomSource,
  ResponseCatalog,
  Severity,
  Treatment,
  TriageOutcome,
} from './types.js';
export { SEVERITIES, TREATMENTS } from './types.js';
