// SQLite-backed event store
import { asc, count, eq } from 'drizzle-orm';
import type { AppDatabase } from '../../db.js';
import { interactions, type NewInteractionRow } from '../../schema.js';
import { AppError } from '../../utils/errors.js';
import type { EventStore, InteractionRecord, NewInteractionRecord } from './types.js';

const INSERT_CHUNK_SIZE = 500;

function assertExclusionInvariant(record: NewInteractionRecord): void {
  const excluded = record.exclusionReason === 'crisis_protocol';
  const unassigned = record.assignedTreatment === null;
  if (excluded !== unassigned) {
    throw AppError.validationError('Excluded sessions must have no treatment and assigned sessions no exclusion', {
      sessionId: record.sessionId,
      assignedTreatment: record.assignedTreatment,
      exclusionReason: record.exclusionReason,
    });
  }
}

function toRow(record: NewInteractionRecord): NewInteractionRow {
  return {
    sessionId: record.sessionId,
    timestamp: record.timestamp,
    inputText: record.inputText,
    sentimentScore: record.sentimentScore,
    severity: record.severity,
    assignedTreatment: record.assignedTreatment,
    responseLatencyMs: record.responseLatencyMs,
    decisionLatencyMs: record.decisionLatencyMs,
    sessionDepth: record.sessionDepth ?? 1,
    converted: record.converted,
    exclusionReason: record.exclusionReason,
    referralSource: record.referralSource,
  };
}

export class SqliteEventStore implements EventStore {
  constructor(private db: AppDatabase) {}

  async append(record: NewInteractionRecord): Promise<number> {
    assertExclusionInvariant(record);

    const existing = this.findBySession(record.sessionId);
    if (existing) {
      throw AppError.conflict('Session already recorded', { sessionId: record.sessionId });
    }

    const result = this.db.insert(interactions).values(toRow(record)).run();
    return Number(result.lastInsertRowid);
  }

  async appendMany(records: NewInteractionRecord[]): Promise<number> {
    records.forEach(assertExclusionInvariant);
    if (records.length === 0) return 0;

    this.db.transaction((tx) => {
      for (let i = 0; i < records.length; i += INSERT_CHUNK_SIZE) {
        const chunk = records.slice(i, i + INSERT_CHUNK_SIZE).map(toRow);
        tx.insert(interactions).values(chunk).run();
      }
    });

    return records.length;
  }

  // Outcome fields are written once; later attempts are conflicts
  async updateOutcome(sessionId: string, converted: boolean, decisionLatencyMs: number): Promise<void> {
    const existing = this.findBySession(sessionId);
    if (!existing) {
      throw AppError.notFound('Session not found', { sessionId });
    }
    if (existing.exclusionReason !== null) {
      throw AppError.conflict('Session is excluded from the experiment', {
        sessionId,
        exclusionReason: existing.exclusionReason,
      });
    }
    if (existing.converted !== null) {
      throw AppError.conflict('Outcome already recorded for session', { sessionId });
    }

    this.db
      .update(interactions)
      .set({ converted, decisionLatencyMs })
      .where(eq(interactions.sessionId, sessionId))
      .run();
  }

  async queryAll(): Promise<InteractionRecord[]> {
    return this.db
      .select()
      .from(interactions)
      .orderBy(asc(interactions.timestamp), asc(interactions.id))
      .all();
  }

  async count(): Promise<number> {
    const row = this.db.select({ value: count() }).from(interactions).get();
    return row?.value ?? 0;
  }

  async clear(): Promise<void> {
    this.db.delete(interactions).run();
  }

  private findBySession(sessionId: string): InteractionRecord | undefined {
    return this.db.select().from(interactions).where(eq(interactions.sessionId, sessionId)).get();
  }
}
