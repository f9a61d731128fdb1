/**
 * Referential-integrity checks for a parsed dataset
 */

import { createLogger } from '../utils/log.js';
import { LoadError } from '../domain/errors.js';
import { pairKey } from '../domain/ids.js';
import { rangesOverlap } from '../utils/math.js';
import type { Dataset, DosageRule } from '../domain/types.js';

const logger = createLogger('validation');

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

function emptyResult(): ValidationResult {
  return { valid: true, errors: [], warnings: [] };
}

function fail(result: ValidationResult, message: string): void {
  result.valid = false;
  result.errors.push(message);
}

/**
 * Product identifiers must be unique and every product must use a declared category
 */
export function validateProducts(dataset: Dataset): ValidationResult {
  const result = emptyResult();
  const categories = new Set<string>();
  const seen = new Set<string>();

  for (const category of dataset.categories) {
    if (categories.has(category)) {
      fail(result, `Duplicate category: ${category}`);
    }
    categories.add(category);
  }

  for (const product of dataset.products) {
    if (seen.has(product.id)) {
      fail(result, `Duplicate product identifier: ${product.id}`);
    }
    seen.add(product.id);

    if (!categories.has(product.category)) {
      fail(result, `Product ${product.id} references undefined category: ${product.category}`);
    }
  }

  return result;
}

/**
 * Dosage rules must reference known products. Overlapping ranges for the
 * same drug are reported as warnings; the calculator rejects them per request.
 */
export function validateDosageRules(dataset: Dataset, product_ids: Set<string>): ValidationResult {
  const result = emptyResult();
  const by_drug = new Map<string, DosageRule[]>();

  dataset.dosage_rules.forEach((rule, idx) => {
    if (!product_ids.has(rule.drug_id)) {
      fail(result, `dosage_rules[${idx}] references unknown drug: ${rule.drug_id}`);
      return;
    }
    const rules = by_drug.get(rule.drug_id) ?? [];
    rules.push(rule);
    by_drug.set(rule.drug_id, rules);
  });

  for (const [drug_id, rules] of by_drug) {
    for (let i = 0; i < rules.length; i++) {
      for (let j = i + 1; j < rules.length; j++) {
        const a = rules[i];
        const b = rules[j];
        if (
          rangesOverlap(a.age_min, a.age_max, b.age_min, b.age_max) &&
          rangesOverlap(a.weight_min, a.weight_max, b.weight_min, b.weight_max)
        ) {
          result.warnings.push(
            `Overlapping dosage rules for ${drug_id}: ` +
              `age ${a.age_min}-${a.age_max}/weight ${a.weight_min}-${a.weight_max} and ` +
              `age ${b.age_min}-${b.age_max}/weight ${b.weight_min}-${b.weight_max}`
          );
        }
      }
    }
  }

  return result;
}

/**
 * Interaction entries must reference known drugs, pair two distinct drugs,
 * and appear at most once per unordered pair.
 */
export function validateInteractions(dataset: Dataset, product_ids: Set<string>): ValidationResult {
  const result = emptyResult();
  const pairs = new Set<string>();

  dataset.interactions.forEach((entry, idx) => {
    const [a, b] = entry.drugs;
    for (const drug of entry.drugs) {
      if (!product_ids.has(drug)) {
        fail(result, `interactions[${idx}] references unknown drug: ${drug}`);
      }
    }
    if (a === b) {
      fail(result, `interactions[${idx}] pairs ${a} with itself`);
      return;
    }
    const key = pairKey(a, b);
    if (pairs.has(key)) {
      fail(result, `interactions[${idx}] duplicates the entry for ${a} and ${b}`);
    }
    pairs.add(key);
  });

  return result;
}

/**
 * Coverage records must reference known products, including any generic
 * alternative, and be unique per product and plan tier.
 */
export function validateCoverage(dataset: Dataset, product_ids: Set<string>): ValidationResult {
  const result = emptyResult();
  const keys = new Set<string>();

  dataset.coverage.forEach((record, idx) => {
    if (!product_ids.has(record.product_id)) {
      fail(result, `coverage[${idx}] references unknown product: ${record.product_id}`);
    }
    if (record.generic_alternative_id !== undefined) {
      if (!product_ids.has(record.generic_alternative_id)) {
        fail(
          result,
          `coverage[${idx}] references unknown generic alternative: ${record.generic_alternative_id}`
        );
      } else if (record.generic_alternative_id === record.product_id) {
        fail(result, `coverage[${idx}] lists ${record.product_id} as its own generic alternative`);
      }
    }
    const key = `${record.product_id}|${record.plan_tier}`;
    if (keys.has(key)) {
      fail(result, `coverage[${idx}] duplicates ${record.product_id} on plan tier ${record.plan_tier}`);
    }
    keys.add(key);
  });

  return result;
}

/**
 * Aggregate validation results
 */
export function aggregateValidationResults(results: ValidationResult[]): ValidationResult {
  return {
    valid: results.every((r) => r.valid),
    errors: results.flatMap((r) => r.errors),
    warnings: results.flatMap((r) => r.warnings),
  };
}

/**
 * Throw a LoadError if validation failed
 */
export function throwIfInvalid(result: ValidationResult, context: string): void {
  if (!result.valid) {
    throw new LoadError(`Validation failed for ${context}`, result.errors);
  }

  // Log warnings even if valid
  for (const warning of result.warnings) {
    logger.warn({ context }, warning);
  }
}
