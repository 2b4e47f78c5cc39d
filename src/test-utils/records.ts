// Record builders shared by the test suites
import type { InteractionRecord, NewInteractionRecord } from '../services/events/types.js';
import type { Treatment } from '../services/triage/types.js';

let sequence = 0;

export function newRecord(overrides: Partial<NewInteractionRecord> = {}): NewInteractionRecord {
  sequence++;
  return {
    sessionId: `session-${sequence}`,
    timestamp: new Date(Date.UTC(2026, 0, 1, 0, 0, sequence)).toISOString(),
    inputText: null,
    sentimentScore: -0.2,
    severity: 'moderate',
    assignedTreatment: 'A_CLINICAL',
    responseLatencyMs: 120,
    decisionLatencyMs: null,
    converted: false,
    exclusionReason: null,
    referralSource: 'direct',
    ...overrides,
  };
}

export function record(overrides: Partial<NewInteractionRecord> = {}): InteractionRecord {
  return { id: sequence + 1, sessionDepth: 1, ...newRecord(overrides) };
}

export function crisisRecord(overrides: Partial<NewInteractionRecord> = {}): InteractionRecord {
  return record({
    sentimentScore: -0.9,
    severity: 'severe',
    assignedTreatment: null,
    converted: null,
    exclusionReason: 'crisis_protocol',
    ...overrides,
  });
}

// `sessions` in-experiment records of one treatment, the first `conversions` converted
export function group(
  treatment: Treatment,
  sessions: number,
  conversions: number,
  overrides: Partial<NewInteractionRecord> = {}
): InteractionRecord[] {
  return Array.from({ length: sessions }, (_, i) =>
    record({ assignedTreatment: treatment, converted: i < conversions, ...overrides })
  );
}
