/**
 * SQLite-based cache for rendered answers
 */

import Database from 'better-sqlite3';
import { CACHE_CONFIG } from '../config/defaults.js';
import { hashObject } from '../utils/hash.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('cache');

export interface CacheEntry {
  cache_key: string;
  model_name: string;
  schema_name: string;
  response_json: string;
  hit_count: number;
  created_at: string;
}

export interface CacheStats {
  total_entries: number;
  total_hits: number;
  by_model: Record<string, number>;
}

export class LLMCache {
  private db: Database.Database;

  constructor(db_path: string = CACHE_CONFIG.DB_PATH) {
    this.db = new Database(db_path);
    this.initializeTables();
  }

  private initializeTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS llm_cache (
        cache_key TEXT PRIMARY KEY,
        model_name TEXT NOT NULL,
        schema_name TEXT NOT NULL,
        response_json TEXT NOT NULL,
        hit_count INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_cache_model ON llm_cache(model_name);
    `);
    logger.debug('LLM cache tables initialized');
  }

  public generateCacheKey(model_name: string, prompt_payload: unknown, schema_name: string): string {
    return hashObject({ model_name, prompt_payload, schema_name });
  }

  public get(cache_key: string): CacheEntry | null {
    const row = this.db
      .prepare<[string], CacheEntry>('SELECT * FROM llm_cache WHERE cache_key = ?')
      .get(cache_key);

    if (!row) {
      logger.debug({ cache_key }, 'Cache miss');
      return null;
    }

    this.db.prepare('UPDATE llm_cache SET hit_count = hit_count + 1 WHERE cache_key = ?').run(cache_key);
    logger.debug({ cache_key }, 'Cache hit');
    return row;
  }

  public set(cache_key: string, model_name: string, schema_name: string, response: unknown): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO llm_cache
         (cache_key, model_name, schema_name, response_json, hit_count, created_at)
         VALUES (?, ?, ?, ?, 0, ?)`
      )
      .run(cache_key, model_name, schema_name, JSON.stringify(response), new Date().toISOString());

    logger.debug({ cache_key, schema_name }, 'Cache entry saved');
  }

  public clear(): number {
    const info = this.db.prepare('DELETE FROM llm_cache').run();
    logger.info({ removed: info.changes }, 'Cache cleared');
    return info.changes;
  }

  public stats(): CacheStats {
    const totals = this.db
      .prepare<[], { count: number; hits: number | null }>(
        'SELECT COUNT(*) as count, SUM(hit_count) as hits FROM llm_cache'
      )
      .get();

    const by_model: Record<string, number> = {};
    const rows = this.db
      .prepare<[], { model_name: string; count: number }>(
        'SELECT model_name, COUNT(*) as count FROM llm_cache GROUP BY model_name'
      )
      .all();
    for (const row of rows) {
      by_model[row.model_name] = row.count;
    }

    return {
      total_entries: totals?.count ?? 0,
      total_hits: totals?.hits ?? 0,
      by_model,
    };
  }

  public close(): void {
    this.db.close();
  }
}

// Global cache instance
let globalCache: LLMCache | null = null;

export function getCache(db_path?: string): LLMCache {
  if (!globalCache) {
    globalCache = new LLMCache(db_path);
  }
  return globalCache;
}

export function closeCache(): void {
  if (globalCache) {
    globalCache.close();
    globalCache = null;
  }
}
