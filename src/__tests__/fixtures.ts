/**
 * Shared test fixtures: a small catalog with known prices, rules, interactions
 * and coverage records
 */

import { buildDataset, type LoadedDataset } from '../catalog/loader.js';
import type { CoverageRecord, Dataset, DosageRule, InteractionEntry, ProductRecord } from '../domain/types.js';

export function createMockProduct(overrides: Partial<ProductRecord> & { id: string }): ProductRecord {
  return {
    name: overrides.id,
    category: 'pain-relief',
    active_ingredients: [overrides.id],
    price: 10,
    strengths: ['100 mg'],
    manufacturer: 'Test Pharma',
    brand_names: [],
    prescription_required: false,
    indications: [],
    contraindications: [],
    warnings: [],
    ...overrides,
  };
}

export function createMockRule(overrides: Partial<DosageRule> & { drug_id: string }): DosageRule {
  return {
    age_min: 18,
    age_max: 120,
    weight_min: 40,
    weight_max: 150,
    dose: { basis: 'flat', amount: 100 },
    max_daily_dose: 400,
    unit: 'mg',
    ...overrides,
  };
}

export const MOCK_PRODUCTS: ProductRecord[] = [
  createMockProduct({
    id: 'aspirin',
    name: 'Aspirin',
    active_ingredients: ['acetylsalicylic acid'],
    price: 5.0,
    brand_names: ['Ecotrin'],
  }),
  createMockProduct({
    id: 'ibuprofen',
    name: 'Ibuprofen',
    active_ingredients: ['ibuprofen'],
    price: 7.0,
    brand_names: ['Advil'],
  }),
  createMockProduct({
    id: 'acetaminophen',
    name: 'Acetaminophen',
    active_ingredients: ['acetaminophen'],
    price: 6.5,
    brand_names: ['Tylenol'],
  }),
  createMockProduct({
    id: 'warfarin',
    name: 'Warfarin',
    category: 'anticoagulant',
    active_ingredients: ['warfarin sodium'],
    price: 12.0,
    brand_names: ['Coumadin'],
    prescription_required: true,
    contraindications: ['pregnancy'],
    warnings: ['Requires regular INR monitoring'],
  }),
  createMockProduct({
    id: 'lisinopril',
    name: 'Lisinopril',
    category: 'blood-pressure',
    active_ingredients: ['lisinopril'],
    price: 4.0,
    prescription_required: true,
  }),
  createMockProduct({
    id: 'zestril',
    name: 'Zestril',
    category: 'blood-pressure',
    active_ingredients: ['lisinopril'],
    price: 38.0,
    prescription_required: true,
  }),
];

export const MOCK_RULES: DosageRule[] = [
  createMockRule({
    drug_id: 'acetaminophen',
    age_min: 18,
    age_max: 120,
    weight_min: 50,
    weight_max: 100,
    dose: { basis: 'per_kg', amount: 10 },
    max_daily_dose: 1000,
  }),
  createMockRule({
    drug_id: 'ibuprofen',
    age_min: 18,
    age_max: 120,
    weight_min: 40,
    weight_max: 150,
    dose: { basis: 'flat', amount: 400 },
    max_daily_dose: 1200,
  }),
  createMockRule({
    drug_id: 'ibuprofen',
    age_min: 6,
    age_max: 17,
    weight_min: 20,
    weight_max: 60,
    dose: { basis: 'per_kg', amount: 10 },
    max_daily_dose: 400,
  }),
];

export const MOCK_INTERACTIONS: InteractionEntry[] = [
  { drugs: ['warfarin', 'aspirin'], severity: 'severe', description: 'Bleeding risk.' },
  { drugs: ['aspirin', 'ibuprofen'], severity: 'moderate', description: 'Reduced antiplatelet effect.' },
  { drugs: ['acetaminophen', 'warfarin'], severity: 'mild', description: 'May raise INR.' },
];

export const MOCK_COVERAGE: CoverageRecord[] = [
  { product_id: 'zestril', plan_tier: 'gold', coverage_pct: 60, generic_alternative_id: 'lisinopril' },
  { product_id: 'zestril', plan_tier: 'silver', coverage_pct: 40, generic_alternative_id: 'lisinopril' },
  { product_id: 'lisinopril', plan_tier: 'gold', coverage_pct: 90 },
  { product_id: 'lisinopril', plan_tier: 'silver', coverage_pct: 30 },
  { product_id: 'warfarin', plan_tier: 'gold', coverage_pct: 80, prior_authorization: true },
];

export function createMockDataset(overrides: Partial<Dataset> = {}): Dataset {
  return {
    categories: ['pain-relief', 'anticoagulant', 'blood-pressure'],
    products: MOCK_PRODUCTS,
    dosage_rules: MOCK_RULES,
    interactions: MOCK_INTERACTIONS,
    coverage: MOCK_COVERAGE,
    ...overrides,
  };
}

export function createMockLoadedDataset(overrides: Partial<Dataset> = {}): LoadedDataset {
  return buildDataset(createMockDataset(overrides));
}
