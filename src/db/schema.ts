/**
 * Drizzle schema for the audit database (SQLite).
 */

import { sql } from 'drizzle-orm';
import { text, integer, real, sqliteTable, index } from 'drizzle-orm/sqlite-core';

export const pipelineResponses = sqliteTable('pipeline_responses', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  fingerprint: text('fingerprint').notNull(),
  query: text('query').notNull(),
  answer: text('answer').notNull(),
  sources: text('sources', { mode: 'json' })
    .$type<string[]>()
    .notNull()
    .default(sql`'[]'`),
  confidence: real('confidence').notNull(),
  processingTime: real('processing_time').notNull(),
  cached: integer('cached', { mode: 'boolean' }).notNull(),
  degraded: integer('degraded', { mode: 'boolean' }).notNull(),
  costEstimate: real('cost_estimate').notNull(),
  respondedAt: text('responded_at').notNull(),
  createdAt: text('created_at').notNull().default(sql`CURRENT_TIMESTAMP`),
}, (table) => ({
  fingerprintIdx: index('idx_pipeline_responses_fingerprint').on(table.fingerprint),
}));

export const costRecords = sqliteTable('cost_records', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  provider: text('provider').notNull(),
  amount: real('amount').notNull(),
  /** Epoch ms. */
  recordedAt: integer('recorded_at').notNull(),
  requestFingerprint: text('request_fingerprint').notNull(),
}, (table) => ({
  providerIdx: index('idx_cost_records_provider').on(table.provider, table.recordedAt),
}));

/** Applied on open; the audit database has no migration history. */
export const CREATE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS pipeline_responses (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  fingerprint TEXT NOT NULL,
  query TEXT NOT NULL,
  answer TEXT NOT NULL,
  sources TEXT NOT NULL DEFAULT '[]',
  confidence REAL NOT NULL,
  processing_time REAL NOT NULL,
  cached INTEGER NOT NULL,
  degraded INTEGER NOT NULL,
  cost_estimate REAL NOT NULL,
  responded_at TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);
CREATE INDEX IF NOT EXISTS idx_pipeline_responses_fingerprint ON pipeline_responses (fingerprint);
CREATE TABLE IF NOT EXISTS cost_records (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  provider TEXT NOT NULL,
  amount REAL NOT NULL,
  recorded_at INTEGER NOT NULL,
  request_fingerprint TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_cost_records_provider ON cost_records (provider, recorded_at);
`;
