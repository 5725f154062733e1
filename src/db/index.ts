/**
 * SQLite audit sink: finalized responses and cost records, written through drizzle.
 */

import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import * as schema from './schema';
import type { CostRecord, PipelineResponse } from '@/types/core';
import type { AuditSink } from '@/types/collaborators';
import { errorMessage } from '@/core/errors';
import { logger } from '@/services/logger';

export type AuditDatabase = BetterSQLite3Database<typeof schema>;

export class SqliteAuditSink implements AuditSink {
  private closed = false;

  constructor(
    private readonly sqlite: Database.Database,
    readonly db: AuditDatabase = drizzle(sqlite, { schema }),
  ) {
    sqlite.exec(schema.CREATE_TABLES_SQL);
  }

  /** `:memory:` opens a private in-process database. */
  static open(dbPath: string): SqliteAuditSink {
    if (dbPath !== ':memory:') {
      const dataDir = path.dirname(path.resolve(dbPath));
      if (!fs.existsSync(dataDir)) fs.mkdirSync(dataDir, { recursive: true });
    }
    const sqlite = new Database(dbPath);
    sqlite.pragma('journal_mode = WAL');
    return new SqliteAuditSink(sqlite);
  }

  appendResponse(fingerprint: string, response: PipelineResponse): void {
    this.write('response', () =>
      this.db
        .insert(schema.pipelineResponses)
        .values({
          fingerprint,
          query: response.query,
          answer: response.answer,
          sources: [...response.sources],
          confidence: response.confidence,
          processingTime: response.processing_time,
          cached: response.cached,
          degraded: response.degraded,
          costEstimate: response.cost_estimate,
          respondedAt: response.timestamp,
        })
        .run(),
    );
  }

  appendCost(record: CostRecord): void {
    this.write('cost', () =>
      this.db
        .insert(schema.costRecords)
        .values({
          provider: record.provider,
          amount: record.amount,
          recordedAt: record.timestamp,
          requestFingerprint: record.requestFingerprint,
        })
        .run(),
    );
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.sqlite.close();
  }

  private write(kind: string, op: () => unknown): void {
    if (this.closed) return;
    try {
      op();
    } catch (err) {
      logger.warn('audit:write_failed', { kind, error: errorMessage(err) });
    }
  }
}
