/**
 * SQLite query log: one row per handled request, for analytics
 */

import Database from 'better-sqlite3';
import type { AggregatedResponse } from '../domain/types.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('query-log');

export interface QueryLogEntry {
  request_id: string;
  query_text: string;
  specialists: string;
  statuses: string;
  drugs: string;
  rendered: number;
  created_at: string;
}

export interface QueryLogStats {
  total_queries: number;
  by_specialist: Record<string, number>;
  errors: number;
}

export class QueryLog {
  private db: Database.Database;

  constructor(db_path: string) {
    this.db = new Database(db_path);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS query_log (
        request_id TEXT PRIMARY KEY,
        query_text TEXT NOT NULL,
        specialists TEXT NOT NULL,
        statuses TEXT NOT NULL,
        drugs TEXT NOT NULL,
        rendered INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_query_log_created ON query_log(created_at);
    `);
  }

  record(response: AggregatedResponse, created_at: Date = new Date()): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO query_log
         (request_id, query_text, specialists, statuses, drugs, rendered, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        response.request_id,
        response.query,
        response.results.map((r) => r.specialist).join(','),
        response.results.map((r) => r.status).join(','),
        response.drugs.join(','),
        response.narrative === undefined ? 0 : 1,
        created_at.toISOString()
      );
    logger.debug({ request_id: response.request_id }, 'Query logged');
  }

  /** Most recent entries first */
  recent(limit: number = 20): QueryLogEntry[] {
    return this.db
      .prepare<[number], QueryLogEntry>(
        'SELECT * FROM query_log ORDER BY created_at DESC, rowid DESC LIMIT ?'
      )
      .all(limit);
  }

  stats(): QueryLogStats {
    const by_specialist: Record<string, number> = {};
    let errors = 0;
    const rows = this.db.prepare<[], Pick<QueryLogEntry, 'specialists' | 'statuses'>>(
      'SELECT specialists, statuses FROM query_log'
    ).all();

    for (const row of rows) {
      const tags = row.specialists ? row.specialists.split(',') : [];
      const statuses = row.statuses ? row.statuses.split(',') : [];
      tags.forEach((tag, i) => {
        by_specialist[tag] = (by_specialist[tag] ?? 0) + 1;
        if (statuses[i] === 'error') errors++;
      });
    }

    return { total_queries: rows.length, by_specialist, errors };
  }

  close(): void {
    this.db.close();
  }
}
