/**
 * Insurance coverage lookup with generic-alternative suggestions
 */

import { NotFoundError } from '../domain/errors.js';
import type { CoverageRecord, CoverageResult, PlanTier, ProductRecord } from '../domain/types.js';
import type { ProductCatalog } from '../catalog/catalog.js';
import { roundTo } from '../utils/math.js';

export function estimateOutOfPocket(product: ProductRecord, coverage_pct: number): number {
  return roundTo(product.price * (1 - coverage_pct / 100));
}

export class CoverageAdvisor {
  private readonly records = new Map<string, CoverageRecord>();

  constructor(
    private readonly catalog: ProductCatalog,
    records: readonly CoverageRecord[]
  ) {
    for (const record of records) {
      this.records.set(recordKey(record.product_id, record.plan_tier), record);
    }
  }

  /**
   * @throws NotFoundError when the product is unknown or has no record for the tier
   */
  lookup(product_ref: string, plan_tier: PlanTier): CoverageResult {
    const product = this.catalog.resolve(product_ref);
    const record = this.records.get(recordKey(product.id, plan_tier));

    if (!record) {
      throw new NotFoundError(`No coverage record for ${product.name} on the ${plan_tier} plan`);
    }

    return {
      product,
      plan_tier,
      coverage_pct: record.coverage_pct,
      estimated_out_of_pocket: estimateOutOfPocket(product, record.coverage_pct),
      prior_authorization: record.prior_authorization ?? false,
      generic_suggestion: this.genericSuggestion(record),
    };
  }

  tiersFor(product_ref: string): PlanTier[] {
    const product = this.catalog.resolve(product_ref);
    return [...this.records.values()].filter((r) => r.product_id === product.id).map((r) => r.plan_tier);
  }

  // Only surfaced when the generic is strictly better covered on the same tier
  private genericSuggestion(record: CoverageRecord): CoverageResult['generic_suggestion'] {
    if (record.generic_alternative_id === undefined) return null;

    const generic_record = this.records.get(recordKey(record.generic_alternative_id, record.plan_tier));
    if (!generic_record || generic_record.coverage_pct <= record.coverage_pct) return null;

    const generic = this.catalog.lookup(record.generic_alternative_id);
    return {
      product: generic,
      coverage_pct: generic_record.coverage_pct,
      estimated_out_of_pocket: estimateOutOfPocket(generic, generic_record.coverage_pct),
    };
  }
}

function recordKey(product_id: string, plan_tier: PlanTier): string {
  return `${product_id}|${plan_tier}`;
}
