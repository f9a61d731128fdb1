/**
 * Zod schemas for HTTP request bodies and query strings
 */

import { z } from 'zod';
import { PlanTierSchema } from '../catalog/schemas.js';

export const PatientContextSchema = z
  .object({
    age: z.number().finite().optional(),
    weight: z.number().finite().optional(),
    plan_tier: PlanTierSchema.optional(),
    current_medications: z.array(z.string().trim().min(1)).optional(),
    conditions: z.array(z.string().trim().min(1)).optional(),
    allergies: z.array(z.string().trim().min(1)).optional(),
  })
  .strict();

export const QueryRequestSchema = z.object({
  query: z.string(),
  context: PatientContextSchema.default({}),
  render: z.boolean().default(false),
});

export const InteractionsRequestSchema = z.object({
  drugs: z.array(z.string().trim().min(1)),
});

// Query-string values arrive as text
const optionalNumber = z.coerce.number().finite().optional();

export const ProductSearchQuerySchema = z.object({
  q: z.string().default(''),
  category: z.string().min(1).optional(),
  max_price: optionalNumber,
  min_price: optionalNumber,
  prescription_required: z
    .enum(['true', 'false'])
    .transform((value) => value === 'true')
    .optional(),
  limit: z.coerce.number().int().positive().max(100).optional(),
});

export const AlternativesQuerySchema = z.object({
  max_price: optionalNumber,
  min_price: optionalNumber,
});

export const DosageQuerySchema = z.object({
  drug: z.string().min(1),
  age: z.coerce.number().finite(),
  weight: z.coerce.number().finite(),
});

export const DoseCheckQuerySchema = DosageQuerySchema.extend({
  proposed: z.coerce.number().finite(),
});

export const SafetyProfileRequestSchema = z.object({
  drug: z.string().trim().min(1),
  conditions: z.array(z.string().trim().min(1)).default([]),
  allergies: z.array(z.string().trim().min(1)).default([]),
});

export const CoverageParamsSchema = z.object({
  productId: z.string().min(1),
  tier: PlanTierSchema,
});
