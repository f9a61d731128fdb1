/**
 * Zod schemas for the catalog dataset file
 */

import { z } from 'zod';
import { PLAN_TIERS, SEVERITIES } from '../domain/types.js';

const nonEmpty = z.string().trim().min(1);

export const PlanTierSchema = z.enum(PLAN_TIERS);

export const ProductRecordSchema = z.object({
  id: nonEmpty,
  name: nonEmpty,
  category: nonEmpty,
  active_ingredients: z.array(nonEmpty).min(1),
  price: z.number().nonnegative(),
  strengths: z.array(nonEmpty),
  manufacturer: nonEmpty,
  brand_names: z.array(nonEmpty).default([]),
  prescription_required: z.boolean().default(false),
  indications: z.array(nonEmpty).default([]),
  contraindications: z.array(nonEmpty).default([]),
  warnings: z.array(nonEmpty).default([]),
  description: z.string().optional(),
});

export const DoseExpressionSchema = z.discriminatedUnion('basis', [
  z.object({ basis: z.literal('per_kg'), amount: z.number().positive() }),
  z.object({ basis: z.literal('flat'), amount: z.number().positive() }),
]);

export const DosageRuleSchema = z
  .object({
    drug_id: nonEmpty,
    age_min: z.number().nonnegative(),
    age_max: z.number().nonnegative(),
    weight_min: z.number().nonnegative(),
    weight_max: z.number().positive(),
    dose: DoseExpressionSchema,
    max_daily_dose: z.number().positive(),
    unit: nonEmpty,
    frequency: z.string().optional(),
  })
  .refine((rule) => rule.age_min <= rule.age_max, { message: 'age_min must not exceed age_max' })
  .refine((rule) => rule.weight_min <= rule.weight_max, {
    message: 'weight_min must not exceed weight_max',
  });

export const InteractionEntrySchema = z.object({
  drugs: z.tuple([nonEmpty, nonEmpty]),
  severity: z.enum(SEVERITIES),
  description: nonEmpty,
});

export const CoverageRecordSchema = z.object({
  product_id: nonEmpty,
  plan_tier: PlanTierSchema,
  coverage_pct: z.number().min(0).max(100),
  generic_alternative_id: nonEmpty.optional(),
  prior_authorization: z.boolean().optional(),
});

export const DatasetSchema = z.object({
  categories: z.array(nonEmpty).min(1),
  products: z.array(ProductRecordSchema),
  dosage_rules: z.array(DosageRuleSchema).default([]),
  interactions: z.array(InteractionEntrySchema).default([]),
  coverage: z.array(CoverageRecordSchema).default([]),
});
