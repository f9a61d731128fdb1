/**
 * Zod schemas for validating LLM outputs with structured outputs
 */

import { z } from 'zod';

export const RenderedAnswerSchema = z.object({
  answer: z.string().min(1),
  key_points: z.array(z.string()),
});

export type RenderedAnswer = z.infer<typeof RenderedAnswerSchema>;

// JSON schema sent with the request; must stay in step with the zod schema above
export const RENDERED_ANSWER_JSON_SCHEMA: Record<string, unknown> = {
  type: 'object',
  properties: {
    answer: {
      type: 'string',
      description: 'Conversational answer for the patient, built only from the supplied findings',
    },
    key_points: {
      type: 'array',
      items: { type: 'string' },
      description: 'Short bullet points, safety findings first',
    },
  },
  required: ['answer', 'key_points'],
  additionalProperties: false,
};
