import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../app.js';
import { openDatabase, type DatabaseHandle } from '../../db.js';
import { SqliteEventStore } from '../../services/events/sqlite-store.js';
import { FixedScorer } from '../../services/sentiment.js';
import { TriageEngine } from '../../services/triage/index.js';
import { newRecord } from '../../test-utils/records.js';

describe('Experiment Routes', () => {
  let app: FastifyInstance;
  let handle: DatabaseHandle;

  beforeAll(async () => {
    handle = openDatabase(':memory:');
    const store = new SqliteEventStore(handle.db);

    await store.appendMany([
      newRecord({ assignedTreatment: 'A_CLINICAL', severity: 'mild', converted: true, decisionLatencyMs: 2000, referralSource: 'google_search' }),
      newRecord({ assignedTreatment: 'A_CLINICAL', severity: 'mild', converted: false, decisionLatencyMs: 4000, referralSource: 'google_search' }),
      newRecord({ assignedTreatment: 'A_CLINICAL', severity: 'severe', converted: null, referralSource: 'direct' }),
      newRecord({ assignedTreatment: 'A_CLINICAL', severity: 'severe', converted: false, decisionLatencyMs: 6000, referralSource: 'direct' }),
      newRecord({ assignedTreatment: 'B_EMPATHETIC', severity: 'severe', converted: true, decisionLatencyMs: 9000, referralSource: 'direct' }),
      newRecord({ assignedTreatment: 'B_EMPATHETIC', severity: 'severe', converted: true, decisionLatencyMs: 11000, referralSource: 'google_search' }),
      newRecord({ assignedTreatment: null, severity: 'severe', converted: null, exclusionReason: 'crisis_protocol' }),
    ]);

    const engine = new TriageEngine({ scorer: new FixedScorer(), crisis: { keywords: [], sentimentThreshold: -0.8 } });
    app = await buildServer({ engine, store, analysis: { pendingPolicy: 'count_as_non_conversion' } });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    handle.close();
  });

  describe('GET /v1/experiment/results', () => {
    it('should count pending sessions as non-conversions by default', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/experiment/results' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.variant_a.sessions).toBe(4);
      expect(body.variant_a.conversions).toBe(1);
      expect(body.variant_a.rate).toBe(0.25);
      expect(body.variant_b.sessions).toBe(2);
      expect(body.variant_b.rate).toBe(1);
      expect(body.relative_lift).toBe(3);
      expect(body.lift_ci_method).toBe('fixed_band');
      expect(body.pending_policy).toBe('count_as_non_conversion');
      expect(body.is_significant).toBe(true);
      expect(body.recommendation.category).toBe('adopt_b');
    });

    it('should exclude pending sessions on request', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/experiment/results?pending=exclude' });

      const body = JSON.parse(response.body);
      expect(body.variant_a.sessions).toBe(3);
      expect(body.pending_policy).toBe('exclude');
    });

    it('should reject an unknown pending policy', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/experiment/results?pending=ignore' });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('validation_error');
    });
  });

  describe('GET /v1/experiment/funnel', () => {
    it('should count the whole population', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/experiment/funnel' });

      expect(JSON.parse(response.body)).toEqual({
        total_sessions: 7,
        experiment_sessions: 6,
        conversions: 3,
        crisis_excluded: 1,
      });
    });
  });

  describe('GET /v1/experiment/segments/severity', () => {
    it('should return all six cells', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/experiment/segments/severity' });

      const { segments } = JSON.parse(response.body);
      expect(segments).toHaveLength(6);
      expect(segments[0]).toEqual({ severity: 'mild', treatment: 'A_CLINICAL', sessions: 2, conversions: 1, conversion_rate: 0.5 });
      expect(segments[4]).toEqual({ severity: 'severe', treatment: 'A_CLINICAL', sessions: 2, conversions: 0, conversion_rate: 0 });
      expect(segments[5]).toEqual({ severity: 'severe', treatment: 'B_EMPATHETIC', sessions: 2, conversions: 2, conversion_rate: 1 });
    });
  });

  describe('GET /v1/experiment/segments/referral', () => {
    it('should order sources by sessions', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/experiment/segments/referral?pending=exclude' });

      const { segments } = JSON.parse(response.body);
      expect(segments).toEqual([
        { referral_source: 'google_search', sessions: 3, conversions: 2, conversion_rate: 2 / 3 },
        { referral_source: 'direct', sessions: 2, conversions: 1, conversion_rate: 0.5 },
      ]);
    });
  });

  describe('GET /v1/experiment/segments/sentiment', () => {
    it('should return one point per in-experiment session', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/experiment/segments/sentiment' });

      expect(response.statusCode).toBe(200);
      const { points } = JSON.parse(response.body);
      expect(points).toHaveLength(6);
      expect(points[2]).toEqual({ sentiment_score: -0.2, converted: false, treatment: 'A_CLINICAL', severity: 'severe' });
    });

    it('should honor the pending query override', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/experiment/segments/sentiment?pending=exclude' });

      expect(JSON.parse(response.body).points).toHaveLength(5);
    });
  });

  describe('GET /v1/experiment/summary', () => {
    it('should report headline rates', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/experiment/summary' });

      expect(JSON.parse(response.body)).toEqual({
        total_sessions: 7,
        total_conversions: 3,
        overall_rate: 0.5,
        variant_a_rate: 0.25,
        variant_b_rate: 1,
      });
    });
  });

  describe('GET /v1/experiment/decision-times', () => {
    it('should summarize decided sessions', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/experiment/decision-times' });

      expect(JSON.parse(response.body)).toEqual({
        treatments: [
          { treatment: 'A_CLINICAL', decided_sessions: 3, mean_ms: 4000, median_ms: 4000 },
          { treatment: 'B_EMPATHETIC', decided_sessions: 2, mean_ms: 10000, median_ms: 10000 },
        ],
      });
    });
  });
});
