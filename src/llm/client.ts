/**
 * OpenAI-compatible client with structured outputs, retries and caching
 *
 * Used only by the outer layers to turn an AggregatedResponse into prose. The
 * decision-support core never waits on it.
 */

import OpenAI from 'openai';
import { z } from 'zod';
import { DEFAULT_MAX_TOKENS, DEFAULT_MODEL, DEFAULT_TEMPERATURE } from '../config/defaults.js';
import type { LLMCache } from './cache.js';
import { createLogger } from '../utils/log.js';
import { hashString } from '../utils/hash.js';

const logger = createLogger('llm-client');

export interface LLMClientConfig {
  api_key?: string;
  base_url?: string;
  model?: string;
  cache?: LLMCache | null;
}

export interface LLMCallOptions {
  temperature?: number;
  max_tokens?: number;
  use_cache?: boolean;
  max_retries?: number;
}

export interface LLMCallResult<T> {
  data: T;
  cached: boolean;
  tokens_used?: number;
  prompt_hash: string;
  response_hash: string;
}

export class LLMClient {
  private client: OpenAI;
  private cache: LLMCache | null;
  readonly model: string;

  constructor(config: LLMClientConfig = {}) {
    this.client = new OpenAI({
      apiKey: config.api_key || process.env.OPENAI_API_KEY,
      baseURL: config.base_url,
      maxRetries: 0, // retries handled below so cache and logging see each attempt
      timeout: 60000,
    });
    this.cache = config.cache ?? null;
    this.model = config.model || DEFAULT_MODEL;
  }

  /**
   * Make a structured LLM call validated against both a JSON schema (sent to
   * the model) and a zod schema (checked locally).
   */
  async callWithSchema<T>(
    schema_name: string,
    json_schema: Record<string, unknown>,
    zod_schema: z.ZodType<T>,
    system_prompt: string,
    user_prompt: string,
    options: LLMCallOptions = {}
  ): Promise<LLMCallResult<T>> {
    const use_cache = this.cache !== null && options.use_cache !== false;
    const max_retries = options.max_retries ?? 2;

    const prompt_payload = { system_prompt, user_prompt };
    const prompt_hash = hashString(JSON.stringify(prompt_payload));
    const cache_key = this.cache?.generateCacheKey(this.model, prompt_payload, schema_name);

    if (use_cache && this.cache && cache_key) {
      const cached_entry = this.cache.get(cache_key);
      if (cached_entry) {
        const validated_data = zod_schema.parse(JSON.parse(cached_entry.response_json));
        logger.info({ schema_name, cached: true }, 'Using cached LLM response');
        return {
          data: validated_data,
          cached: true,
          prompt_hash,
          response_hash: hashString(cached_entry.response_json),
        };
      }
    }

    logger.info({ schema_name, model: this.model, cached: false }, 'Making new LLM API call');

    let last_error: Error | null = null;
    for (let attempt = 0; attempt <= max_retries; attempt++) {
      try {
        if (attempt > 0) {
          logger.warn({ attempt, schema_name }, 'Retrying LLM call');
          await this.sleep(500 * Math.pow(2, attempt)); // Exponential backoff
        }

        const result = await this.callOnce(schema_name, json_schema, zod_schema, system_prompt, user_prompt, options);

        if (use_cache && this.cache && cache_key) {
          this.cache.set(cache_key, this.model, schema_name, result.data);
        }

        return { ...result, prompt_hash };
      } catch (error) {
        last_error = error instanceof Error ? error : new Error(String(error));
        logger.error({ error: last_error.message, attempt, schema_name }, 'LLM call failed');

        // Don't retry on request or authentication errors
        if (
          error instanceof OpenAI.APIError &&
          (error.status === 400 || error.status === 401 || error.status === 403)
        ) {
          throw error;
        }
      }
    }

    throw last_error || new Error('LLM call failed after retries');
  }

  private async callOnce<T>(
    schema_name: string,
    json_schema: Record<string, unknown>,
    zod_schema: z.ZodType<T>,
    system_prompt: string,
    user_prompt: string,
    options: LLMCallOptions
  ): Promise<Omit<LLMCallResult<T>, 'prompt_hash'>> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
      { role: 'system', content: system_prompt },
      { role: 'user', content: user_prompt },
    ];

    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
      max_tokens: options.max_tokens ?? DEFAULT_MAX_TOKENS,
      response_format: {
        type: 'json_schema',
        json_schema: {
          name: schema_name,
          strict: true,
          schema: json_schema,
        },
      },
    });

    const content = completion.choices[0]?.message.content;
    if (!content) {
      throw new Error('No content in LLM response');
    }

    const validated_data = zod_schema.parse(JSON.parse(content));
    logger.info({ schema_name, tokens: completion.usage?.total_tokens }, 'LLM call completed');

    return {
      data: validated_data,
      cached: false,
      tokens_used: completion.usage?.total_tokens,
      response_hash: hashString(content),
    };
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
