// Experiment analytics routes
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  analyzeExperiment,
  getDecisionTimeStats,
  getFunnel,
  getReferralBreakdown,
  getSentimentConversionPoints,
  getSeverityBreakdown,
  getSummary,
  type AnalysisOptions,
} from '../services/analytics/index.js';
import type { EventStore } from '../services/events/types.js';
import { AppError } from '../utils/errors.js';

const AnalysisQuerySchema = z.object({
  pending: z.enum(['count_as_non_conversion', 'exclude']).optional(),
});

export interface ExperimentRouteOptions {
  store: EventStore;
  analysis: AnalysisOptions;
}

export async function experimentRoutes(server: FastifyInstance, opts: ExperimentRouteOptions) {
  const { store, analysis } = opts;

  // Per-query pending override on top of the configured defaults
  function resolveOptions(query: unknown): AnalysisOptions {
    const parsed = AnalysisQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw AppError.validationError('Invalid query parameters', parsed.error.flatten());
    }
    return {
      ...analysis,
      pendingPolicy: parsed.data.pending ?? analysis.pendingPolicy,
    };
  }

  // GET /v1/experiment/results - A/B significance and recommendation
  server.get('/experiment/results', async (request) => {
    const options = resolveOptions(request.query);
    const records = await store.queryAll();
    return analyzeExperiment(records, options);
  });

  // GET /v1/experiment/funnel - Session funnel over the full population
  server.get('/experiment/funnel', async () => {
    const records = await store.queryAll();
    return getFunnel(records);
  });

  // GET /v1/experiment/segments/severity - Severity × treatment cells
  server.get('/experiment/segments/severity', async (request) => {
    const options = resolveOptions(request.query);
    const records = await store.queryAll();
    return { segments: getSeverityBreakdown(records, options) };
  });

  // GET /v1/experiment/segments/referral - Conversion by referral source
  server.get('/experiment/segments/referral', async (request) => {
    const options = resolveOptions(request.query);
    const records = await store.queryAll();
    return { segments: getReferralBreakdown(records, options) };
  });

  // GET /v1/experiment/segments/sentiment - Sentiment score against outcome per session
  server.get('/experiment/segments/sentiment', async (request) => {
    const options = resolveOptions(request.query);
    const records = await store.queryAll();
    return { points: getSentimentConversionPoints(records, options) };
  });

  // GET /v1/experiment/summary - Headline numbers
  server.get('/experiment/summary', async (request) => {
    const options = resolveOptions(request.query);
    const records = await store.queryAll();
    return getSummary(records, options);
  });

  // GET /v1/experiment/decision-times - Time to decision per treatment
  server.get('/experiment/decision-times', async () => {
    const records = await store.queryAll();
    return { treatments: getDecisionTimeStats(records) };
  });
}
