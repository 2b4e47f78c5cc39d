// Triage routes
import crypto from 'crypto';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { EventStore } from '../services/events/types.js';
import type { TriageEngine } from '../services/triage/index.js';
import { anonymizeInput } from '../utils/anonymize.js';
import { AppError } from '../utils/errors.js';

export const MIN_INPUT_LENGTH = 5;
export const MAX_INPUT_LENGTH = 5000;

export const VALID_REFERRAL_SOURCES = new Set([
  'google_search',
  'facebook_ads',
  'instagram_ads',
  'direct',
  'referral',
  'email_campaign',
  'tiktok_ads',
  'organic',
  'other',
]);

const TriageRequestSchema = z.object({
  text: z.string().trim().min(MIN_INPUT_LENGTH).max(MAX_INPUT_LENGTH),
  referral_source: z.string().optional(),
  session_id: z.string().uuid().optional(),
});

const OutcomeRequestSchema = z.object({
  converted: z.boolean(),
  decision_latency_ms: z.number().int().nonnegative(),
});

export interface TriageRouteOptions {
  engine: TriageEngine;
  store: EventStore;
}

// Unknown or missing sources are attributed to direct traffic
export function normalizeReferralSource(source?: string): string {
  const trimmed = (source ?? '').trim();
  return VALID_REFERRAL_SOURCES.has(trimmed) ? trimmed : 'direct';
}

export async function triageRoutes(server: FastifyInstance, opts: TriageRouteOptions) {
  const { engine, store } = opts;

  // POST /v1/triage - Score, classify and route one message
  server.post('/triage', async (request, reply) => {
    const parsed = TriageRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', parsed.error.flatten());
    }
    const body = parsed.data;

    const start = performance.now();
    const { result, trigger } = await engine.analyze(body.text);
    const sessionId = body.session_id ?? crypto.randomUUID();
    const responseTimeMs = Math.round(performance.now() - start);

    await store.append({
      sessionId,
      timestamp: new Date().toISOString(),
      inputText: anonymizeInput(body.text),
      sentimentScore: result.sentiment_score,
      severity: result.severity,
      assignedTreatment: result.is_crisis ? null : result.assigned_treatment,
      responseLatencyMs: responseTimeMs,
      decisionLatencyMs: null,
      converted: null,
      exclusionReason: result.is_crisis ? 'crisis_protocol' : null,
      referralSource: normalizeReferralSource(body.referral_source),
    });

    if (trigger) {
      request.log.warn({ sessionId, trigger: trigger.kind }, 'Crisis protocol triggered, session excluded from experiment');
    } else {
      request.log.debug({ sessionId, severity: result.severity }, 'Session assigned to experiment');
    }

    return reply.code(201).send({
      session_id: sessionId,
      result,
      response_time_ms: responseTimeMs,
    });
  });

  // POST /v1/triage/:sessionId/outcome - Record the participant's decision
  server.post<{ Params: { sessionId: string } }>('/triage/:sessionId/outcome', async (request) => {
    const { sessionId } = request.params;
    const parsed = OutcomeRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', parsed.error.flatten());
    }

    await store.updateOutcome(sessionId, parsed.data.converted, parsed.data.decision_latency_ms);
    request.log.info({ sessionId, converted: parsed.data.converted }, 'Outcome recorded');

    return { ok: true };
  });
}
