import { sqliteTable, integer, text, real, index, uniqueIndex } from 'drizzle-orm/sqlite-core';
import { SEVERITIES, TREATMENTS } from './services/triage/types.js';

/**
 * Interactions Table
 * One row per triage request. Outcome columns (converted, time_to_decision_ms)
 * stay null until the participant decides; crisis rows never get a variant.
 */
export const interactions = sqliteTable(
  'interactions',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    sessionId: text('session_id').notNull(),
    timestamp: text('timestamp').notNull(),
    inputText: text('input_text'),
    sentimentScore: real('sentiment_score').notNull(),
    severity: text('severity_bucket', { enum: SEVERITIES }).notNull(),
    assignedTreatment: text('assigned_variant', { enum: TREATMENTS }),
    responseLatencyMs: integer('response_time_ms').notNull(),
    decisionLatencyMs: integer('time_to_decision_ms'),
    sessionDepth: integer('session_depth').notNull().default(1),
    converted: integer('converted', { mode: 'boolean' }),
    exclusionReason: text('experiment_excluded', { enum: ['crisis_protocol'] }),
    referralSource: text('referral_source').notNull(),
  },
  (table) => [
    uniqueIndex('idx_interactions_session').on(table.sessionId),
    index('idx_interactions_variant').on(table.assignedTreatment),
    index('idx_interactions_converted').on(table.converted),
    index('idx_interactions_severity').on(table.severity),
    index('idx_interactions_timestamp').on(table.timestamp),
  ]
);

export type InteractionRow = typeof interactions.$inferSelect;
export type NewInteractionRow = typeof interactions.$inferInsert;

// Kept in step with the table definition above
export const INTERACTIONS_DDL = `
  CREATE TABLE IF NOT EXISTS interactions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    input_text TEXT,
    sentiment_score REAL NOT NULL,
    severity_bucket TEXT NOT NULL CHECK(severity_bucket IN ('mild', 'moderate', 'severe')),
    assigned_variant TEXT CHECK(assigned_variant IN ('A_CLINICAL', 'B_EMPATHETIC')),
    response_time_ms INTEGER NOT NULL,
    time_to_decision_ms INTEGER,
    session_depth INTEGER NOT NULL DEFAULT 1,
    converted INTEGER CHECK(converted IN (0, 1)),
    experiment_excluded TEXT CHECK(experiment_excluded IN ('crisis_protocol')),
    referral_source TEXT NOT NULL,
    CHECK((experiment_excluded IS NULL) = (assigned_variant IS NOT NULL))
  );
  CREATE UNIQUE INDEX IF NOT EXISTS idx_interactions_session ON interactions(session_id);
  CREATE INDEX IF NOT EXISTS idx_interactions_variant ON interactions(assigned_variant);
  CREATE INDEX IF NOT EXISTS idx_interactions_converted ON interactions(converted);
  CREATE INDEX IF NOT EXISTS idx_interactions_severity ON interactions(severity_bucket);
  CREATE INDEX IF NOT EXISTS idx_interactions_timestamp ON interactions(timestamp);
`;
