// Synthetic interaction data for demos
// Variant B is biased to convert better, most strongly for severe sessions

import fs from 'fs/promises';
import { z } from 'zod';
import { AppError } from '../utils/errors.js';
import { anonymizeInput } from '../utils/anonymize.js';
import { RNG } from '../utils/rng.js';
import type { EventStore, NewInteractionRecord } from './events/types.js';
import { SEVERITIES, TREATMENTS } from './triage/types.js';
import type { Severity, Treatment } from './triage/types.js';

const probability = z.number().min(0).max(1);

const bySeverity = <T extends z.ZodTypeAny>(schema: T) =>
  z.object({ mild: schema, moderate: schema, severe: schema });

const SyntheticProfileSchema = z.object({
  startDate: z.string().datetime(),
  endDate: z.string().datetime(),
  crisisRate: probability,
  crisisInput: z.string().min(1),
  severityWeights: bySeverity(z.number().nonnegative()),
  conversionRates: z.object({
    A_CLINICAL: bySeverity(probability),
    B_EMPATHETIC: bySeverity(probability),
  }),
  sentiment: bySeverity(z.object({ mean: z.number(), stdDev: z.number().positive() })),
  decisionTimeMs: bySeverity(
    z.object({ min: z.number().int().positive(), max: z.number().int().positive() })
      .refine(range => range.min <= range.max * 0.7, 'min must not exceed 70% of max')
  ),
  referralSources: z.array(z.object({ source: z.string().min(1), weight: z.number().positive() })).min(1),
  sampleInputs: bySeverity(z.array(z.string().min(1)).min(1)),
}).refine(profile => Date.parse(profile.startDate) <= Date.parse(profile.endDate), 'startDate must not be after endDate');

export type SyntheticProfile = z.infer<typeof SyntheticProfileSchema>;

export interface SeedSummary {
  generated: number;
  crisis: number;
  sessions: Record<Treatment, number>;
  conversions: Record<Treatment, number>;
}

export function parseSyntheticProfile(raw: unknown): SyntheticProfile {
  const parsed = SyntheticProfileSchema.safeParse(raw);
  if (!parsed.success) {
    throw AppError.configuration('Invalid synthetic data profile', parsed.error.flatten());
  }
  return parsed.data;
}

export async function loadSyntheticProfile(filePath: string): Promise<SyntheticProfile> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  } catch (err) {
    throw AppError.configuration(`Cannot load synthetic data profile ${filePath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  return parseSyntheticProfile(raw);
}

const clampScore = (score: number) => Math.max(-1, Math.min(1, score));

function sentimentFor(rng: RNG, profile: SyntheticProfile, severity: Severity): number {
  const { mean, stdDev } = profile.sentiment[severity];
  return clampScore(rng.normalDistribution(mean, stdDev));
}

// Conversions cluster late; non-conversions either bounce early or deliberate and leave
function decisionTimeFor(rng: RNG, profile: SyntheticProfile, severity: Severity, converted: boolean): number {
  const { min, max } = profile.decisionTimeMs[severity];
  if (converted) {
    return Math.round(rng.triangular(min, max * 0.7, max));
  }
  if (rng.uniform() < 0.4) {
    return Math.round(rng.uniformRange(1000, min));
  }
  return Math.round(rng.uniformRange(min, max * 1.2));
}

function responseLatency(rng: RNG): number {
  if (rng.uniform() < 0.95) {
    return Math.round(rng.uniformRange(50, 200));
  }
  return Math.round(rng.uniformRange(200, 500));
}

function timestampBetween(rng: RNG, start: string, end: string): string {
  const startMs = Date.parse(start);
  const spanSeconds = Math.floor((Date.parse(end) - startMs) / 1000);
  return new Date(startMs + rng.integer(0, spanSeconds) * 1000).toISOString();
}

export function generateSyntheticRecords(count: number, rng: RNG, profile: SyntheticProfile): NewInteractionRecord[] {
  const severityChoices = SEVERITIES.map(severity => ({ value: severity, weight: profile.severityWeights[severity] }));
  const referralChoices = profile.referralSources.map(({ source, weight }) => ({ value: source, weight }));
  const records: NewInteractionRecord[] = [];

  for (let i = 0; i < count; i++) {
    const base = {
      sessionId: rng.uuid(),
      timestamp: timestampBetween(rng, profile.startDate, profile.endDate),
      responseLatencyMs: responseLatency(rng),
      referralSource: rng.weightedChoice(referralChoices),
    };

    if (rng.uniform() < profile.crisisRate) {
      records.push({
        ...base,
        inputText: anonymizeInput(profile.crisisInput),
        sentimentScore: clampScore(sentimentFor(rng, profile, 'severe') - 0.3),
        severity: 'severe',
        assignedTreatment: null,
        decisionLatencyMs: null,
        converted: null,
        exclusionReason: 'crisis_protocol',
      });
      continue;
    }

    const severity = rng.weightedChoice(severityChoices);
    const treatment = rng.pick(TREATMENTS);
    const converted = rng.uniform() < profile.conversionRates[treatment][severity];

    records.push({
      ...base,
      inputText: anonymizeInput(rng.pick(profile.sampleInputs[severity])),
      sentimentScore: sentimentFor(rng, profile, severity),
      severity,
      assignedTreatment: treatment,
      decisionLatencyMs: decisionTimeFor(rng, profile, severity, converted),
      converted,
      exclusionReason: null,
    });
  }

  return records;
}

export function summarizeRecords(records: NewInteractionRecord[]): SeedSummary {
  const summary: SeedSummary = {
    generated: records.length,
    crisis: 0,
    sessions: { A_CLINICAL: 0, B_EMPATHETIC: 0 },
    conversions: { A_CLINICAL: 0, B_EMPATHETIC: 0 },
  };

  for (const record of records) {
    if (record.assignedTreatment === null) {
      summary.crisis++;
      continue;
    }
    summary.sessions[record.assignedTreatment]++;
    if (record.converted === true) {
      summary.conversions[record.assignedTreatment]++;
    }
  }

  return summary;
}

export async function seedEventStore(
  store: EventStore,
  options: { count: number; profile: SyntheticProfile; rng?: RNG; clearExisting?: boolean }
): Promise<SeedSummary> {
  if (options.clearExisting) {
    await store.clear();
  }

  const records = generateSyntheticRecords(options.count, options.rng ?? new RNG(), options.profile);
  await store.appendMany(records);
  return summarizeRecords(records);
}
