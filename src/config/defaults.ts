/**
 * Default configuration values and environment resolution
 */

import { join } from 'path';
import { z } from 'zod';

export const DEFAULT_MODEL = 'gpt-4o-mini';
export const DEFAULT_TEMPERATURE = 0.2;
export const DEFAULT_MAX_TOKENS = 1200;

export const DISCLAIMER =
  'This information is for general educational purposes only and is not medical advice, ' +
  'a diagnosis, or a prescription. Always consult a licensed physician or pharmacist before ' +
  'starting, stopping, or changing any medication.';

export const DOSAGE_NOTICE = 'Dosage figure is informational only and is not a prescription.';

export const NO_INTERACTION_ON_RECORD = 'No known interaction on record';

export const SEARCH_DEFAULTS = {
  EXACT_NAME_SCORE: 1.0,
  INGREDIENT_SCORE: 0.8,
  PARTIAL_SCORE: 0.5,
  MIN_TOKEN_LENGTH: 3,
  MAX_RESULTS: 20,
};

export const PEDIATRIC_AGE_LIMIT = 18;

// Query words never used as search tokens
export const STOP_WORDS = new Set([
  'the', 'and', 'for', 'with', 'what', 'which', 'who', 'how', 'are', 'can', 'does',
  'should', 'would', 'could', 'about', 'any', 'some', 'that', 'this', 'there', 'have',
  'need', 'want', 'please', 'tell', 'give', 'find', 'search', 'show', 'look', 'products',
  'product', 'medication', 'medications', 'medicine', 'drug', 'drugs',
]);

export const CACHE_CONFIG = {
  DB_PATH: 'llm_cache.db',
  ENABLE_CACHE: true,
};

const EnvSchema = z.object({
  CATALOG_PATH: z.string().min(1).optional(),
  PORT: z.coerce.number().int().positive().default(3001),
  OPENAI_API_KEY: z.string().optional(),
  LLM_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  LLM_BASE_URL: z.string().url().optional(),
  CACHE_DB_PATH: z.string().min(1).default(CACHE_CONFIG.DB_PATH),
  QUERY_LOG_PATH: z.string().min(1).default('query_log.db'),
  ENABLE_CACHE: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
});

export interface AppConfig {
  catalog_path: string;
  port: number;
  openai_api_key?: string;
  llm_model: string;
  llm_base_url?: string;
  cache_db_path: string;
  query_log_path: string;
  enable_cache: boolean;
}

/**
 * Read configuration from the environment. Blank variables count as unset.
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration:\n  - ${problems.join('\n  - ')}`);
  }

  const vars = parsed.data;
  return {
    catalog_path: vars.CATALOG_PATH ?? join(process.cwd(), 'data', 'catalog.json'),
    port: vars.PORT,
    openai_api_key: vars.OPENAI_API_KEY,
    llm_model: vars.LLM_MODEL,
    llm_base_url: vars.LLM_BASE_URL,
    cache_db_path: vars.CACHE_DB_PATH,
    query_log_path: vars.QUERY_LOG_PATH,
    enable_cache: vars.ENABLE_CACHE,
  };
}
