/**
 * Deterministic dosage calculation over age/weight-banded rules
 */

import { DOSAGE_NOTICE, PEDIATRIC_AGE_LIMIT } from '../config/defaults.js';
import { AmbiguousRuleError, InvalidInputError } from '../domain/errors.js';
import type {
  DoseCheckOutcome,
  DosageOutcome,
  DosageRule,
  NoApplicableRule,
  ProductRecord,
} from '../domain/types.js';
import type { ProductCatalog } from '../catalog/catalog.js';
import { inRange, roundTo } from '../utils/math.js';

export function validatePatient(age: number, weight: number): void {
  if (!Number.isFinite(age) || age < 0) {
    throw new InvalidInputError(`Patient age must be a number of at least 0, got: ${age}`);
  }
  if (!Number.isFinite(weight) || weight <= 0) {
    throw new InvalidInputError(`Patient weight must be a number greater than 0, got: ${weight}`);
  }
}

export function ruleApplies(rule: DosageRule, age: number, weight: number): boolean {
  return inRange(age, rule.age_min, rule.age_max) && inRange(weight, rule.weight_min, rule.weight_max);
}

export function computeDose(rule: DosageRule, weight: number): number {
  return rule.dose.basis === 'per_kg' ? rule.dose.amount * weight : rule.dose.amount;
}

export class DosageCalculator {
  private readonly rules_by_drug = new Map<string, DosageRule[]>();

  constructor(
    private readonly catalog: ProductCatalog,
    rules: readonly DosageRule[]
  ) {
    for (const rule of rules) {
      const list = this.rules_by_drug.get(rule.drug_id) ?? [];
      list.push(rule);
      this.rules_by_drug.set(rule.drug_id, list);
    }
  }

  /**
   * @throws InvalidInputError for out-of-range age or weight
   * @throws NotFoundError when the drug is not in the catalog
   * @throws AmbiguousRuleError when more than one rule covers the inputs
   */
  calculate(drug_ref: string, age: number, weight: number): DosageOutcome {
    validatePatient(age, weight);
    const product = this.catalog.resolve(drug_ref);
    const rule = this.selectRule(product, age, weight);
    if (!rule) return noApplicableRule(product, age, weight);

    const unclamped = roundTo(computeDose(rule, weight));
    const clamped = unclamped > rule.max_daily_dose;
    const dose = clamped ? rule.max_daily_dose : unclamped;

    const caveats: string[] = [];
    if (clamped) {
      caveats.push(
        `Calculated dose of ${unclamped} ${rule.unit} exceeds the maximum daily dose; ` +
          `capped at ${rule.max_daily_dose} ${rule.unit}.`
      );
    }
    caveats.push(...closingCaveats(age));

    return {
      status: 'ok',
      drug_id: product.id,
      drug_name: product.name,
      dose,
      unit: rule.unit,
      clamped,
      rule,
      caveats,
    };
  }

  /**
   * Compare a proposed daily amount, in the rule's unit, with the maximum
   * daily dose of the rule covering the patient.
   *
   * @throws InvalidInputError for out-of-range inputs or a non-positive proposal
   * @throws NotFoundError when the drug is not in the catalog
   * @throws AmbiguousRuleError when more than one rule covers the inputs
   */
  checkDose(drug_ref: string, age: number, weight: number, proposed_dose: number): DoseCheckOutcome {
    validatePatient(age, weight);
    if (!Number.isFinite(proposed_dose) || proposed_dose <= 0) {
      throw new InvalidInputError(`Proposed dose must be a number greater than 0, got: ${proposed_dose}`);
    }
    const product = this.catalog.resolve(drug_ref);
    const rule = this.selectRule(product, age, weight);
    if (!rule) return noApplicableRule(product, age, weight);

    const { max_daily_dose, unit } = rule;
    const within_limit = proposed_dose <= max_daily_dose;
    const caveats = [
      within_limit
        ? `Proposed ${proposed_dose} ${unit} per day is within the maximum daily dose of ${max_daily_dose} ${unit}.`
        : `Proposed ${proposed_dose} ${unit} per day exceeds the maximum daily dose of ${max_daily_dose} ${unit} ` +
          `by ${roundTo(proposed_dose - max_daily_dose)} ${unit}.`,
      ...closingCaveats(age),
    ];

    return {
      status: 'ok',
      drug_id: product.id,
      drug_name: product.name,
      proposed_dose,
      max_daily_dose,
      recommended_dose: Math.min(roundTo(computeDose(rule, weight)), max_daily_dose),
      unit,
      within_limit,
      caveats,
    };
  }

  rulesFor(drug_ref: string): readonly DosageRule[] {
    return this.rules_by_drug.get(this.catalog.resolve(drug_ref).id) ?? [];
  }

  private selectRule(product: ProductRecord, age: number, weight: number): DosageRule | null {
    const matching = (this.rules_by_drug.get(product.id) ?? []).filter((rule) =>
      ruleApplies(rule, age, weight)
    );

    if (matching.length > 1) {
      throw new AmbiguousRuleError(
        `${matching.length} dosage rules for ${product.name} cover age ${age} and weight ${weight} kg; ` +
          'the rule table needs correcting before a dose can be given',
        matching.length
      );
    }
    return matching[0] ?? null;
  }
}

function noApplicableRule(product: ProductRecord, age: number, weight: number): NoApplicableRule {
  return {
    status: 'no_applicable_rule',
    drug_id: product.id,
    drug_name: product.name,
    age,
    weight,
    caveats: [`No dosage rule on record for ${product.name} at age ${age} and weight ${weight} kg.`, DOSAGE_NOTICE],
  };
}

function closingCaveats(age: number): string[] {
  return age < PEDIATRIC_AGE_LIMIT
    ? ['Pediatric patient: dosing must be verified by a pediatrician.', DOSAGE_NOTICE]
    : [DOSAGE_NOTICE];
}
