// Event Store Types

import type { ExclusionReason, Severity, Treatment } from '../triage/types.js';

export interface InteractionRecord {
  id: number;
  sessionId: string;
  timestamp: string;
  inputText: string | null;
  sentimentScore: number;
  severity: Severity;
  assignedTreatment: Treatment | null; // null exactly for crisis-excluded rows
  responseLatencyMs: number;
  decisionLatencyMs: number | null;
  sessionDepth: number;
  converted: boolean | null; // null while the decision is pending
  exclusionReason: ExclusionReason | null;
  referralSource: string;
}

export type NewInteractionRecord = Omit<InteractionRecord, 'id' | 'sessionDepth'> & {
  sessionDepth?: number;
};

export interface EventStore {
  append(record: NewInteractionRecord): Promise<number>;
  appendMany(records: NewInteractionRecord[]): Promise<number>;
  updateOutcome(sessionId: string, converted: boolean, decisionLatencyMs: number): Promise<void>;
  queryAll(): Promise<InteractionRecord[]>;
  count(): Promise<number>;
  clear(): Promise<void>;
}
