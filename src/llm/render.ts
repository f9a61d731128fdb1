/**
 * Natural-language rendering of aggregated responses
 *
 * The model only rewrites findings already computed by the specialists. When
 * no client is configured or the call fails, a deterministic summary is used
 * instead and the structured response is returned unchanged apart from the
 * narrative.
 */

import type { AppConfig } from '../config/defaults.js';
import type { AggregatedResponse } from '../domain/types.js';
import { describeError } from '../domain/errors.js';
import { summarizeResponse } from '../pipeline/export.js';
import { withNarrative } from '../pipeline/orchestrator.js';
import { createLogger } from '../utils/log.js';
import { getCache } from './cache.js';
import { LLMClient } from './client.js';
import { RENDER_SYSTEM_PROMPT, createRenderUserPrompt } from './prompts.js';
import { RENDERED_ANSWER_JSON_SCHEMA, RenderedAnswerSchema, type RenderedAnswer } from './schemas.js';

const logger = createLogger('render');

/**
 * Subset of LLMClient used for rendering, so callers can supply a stand-in.
 */
export type RenderClient = Pick<LLMClient, 'callWithSchema'>;

export interface RenderOutcome {
  response: AggregatedResponse;
  rendered_by: 'llm' | 'fallback';
  cached: boolean;
}

export function createRenderClient(config: AppConfig): LLMClient | null {
  if (!config.openai_api_key) return null;
  return new LLMClient({
    api_key: config.openai_api_key,
    base_url: config.llm_base_url,
    model: config.llm_model,
    cache: config.enable_cache ? getCache(config.cache_db_path) : null,
  });
}

export function formatRenderedAnswer(rendered: RenderedAnswer): string {
  if (rendered.key_points.length === 0) return rendered.answer;
  return [rendered.answer, '', ...rendered.key_points.map((point) => `- ${point}`)].join('\n');
}

export async function renderResponse(
  response: AggregatedResponse,
  client: RenderClient | null
): Promise<RenderOutcome> {
  if (!client) {
    return { response: withNarrative(response, summarizeResponse(response)), rendered_by: 'fallback', cached: false };
  }

  try {
    const result = await client.callWithSchema(
      'rendered_answer',
      RENDERED_ANSWER_JSON_SCHEMA,
      RenderedAnswerSchema,
      RENDER_SYSTEM_PROMPT,
      createRenderUserPrompt(response)
    );
    return {
      response: withNarrative(response, formatRenderedAnswer(result.data)),
      rendered_by: 'llm',
      cached: result.cached,
    };
  } catch (error) {
    logger.warn(
      { request_id: response.request_id, error: describeError(error) },
      'Rendering failed; using plain summary'
    );
    return { response: withNarrative(response, summarizeResponse(response)), rendered_by: 'fallback', cached: false };
  }
}
