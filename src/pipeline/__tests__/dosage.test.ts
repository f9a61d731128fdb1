/**
 * Unit tests for the dosage calculator
 *
 * Tests verify:
 * - Inclusive age/weight bands
 * - Clamping to the maximum daily dose
 * - No-rule results versus ambiguous-rule errors
 * - Input validation
 */

import { describe, it, expect } from 'vitest';
import { DosageCalculator, computeDose, ruleApplies } from '../dosage.js';
import { AmbiguousRuleError, InvalidInputError, NotFoundError } from '../../domain/errors.js';
import { DOSAGE_NOTICE } from '../../config/defaults.js';
import { MOCK_RULES, createMockLoadedDataset, createMockRule } from '../../__tests__/fixtures.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const data = createMockLoadedDataset();
const calculator = new DosageCalculator(data.catalog, data.dosage_rules);

// ============================================================================
// Rule selection
// ============================================================================

describe('ruleApplies', () => {
  const rule = createMockRule({ drug_id: 'x', age_min: 18, age_max: 65, weight_min: 50, weight_max: 100 });

  it('treats both bounds as inclusive', () => {
    expect(ruleApplies(rule, 18, 50)).toBe(true);
    expect(ruleApplies(rule, 65, 100)).toBe(true);
    expect(ruleApplies(rule, 17.9, 70)).toBe(false);
    expect(ruleApplies(rule, 30, 100.5)).toBe(false);
  });
});

describe('computeDose', () => {
  it('multiplies per-kg amounts by weight and leaves flat amounts alone', () => {
    expect(computeDose(createMockRule({ drug_id: 'x', dose: { basis: 'per_kg', amount: 15 } }), 20)).toBe(300);
    expect(computeDose(createMockRule({ drug_id: 'x', dose: { basis: 'flat', amount: 250 } }), 20)).toBe(250);
  });
});

// ============================================================================
// Calculation
// ============================================================================

describe('DosageCalculator.calculate', () => {
  it('computes a per-kg dose without a clamp caveat', () => {
    const result = calculator.calculate('Acetaminophen', 30, 70);
    expect(result).toMatchObject({
      status: 'ok',
      drug_id: 'acetaminophen',
      dose: 700,
      unit: 'mg',
      clamped: false,
      caveats: [DOSAGE_NOTICE],
    });
  });

  it('returns NoApplicableRule when no band covers the patient', () => {
    const result = calculator.calculate('Acetaminophen', 30, 150);
    expect(result).toEqual({
      status: 'no_applicable_rule',
      drug_id: 'acetaminophen',
      drug_name: 'Acetaminophen',
      age: 30,
      weight: 150,
      caveats: ['No dosage rule on record for Acetaminophen at age 30 and weight 150 kg.', DOSAGE_NOTICE],
    });
  });

  it('returns NoApplicableRule for a drug without rules', () => {
    expect(calculator.calculate('warfarin', 40, 80).status).toBe('no_applicable_rule');
  });

  it('accepts band edges', () => {
    const low = calculator.calculate('acetaminophen', 18, 50);
    const high = calculator.calculate('acetaminophen', 120, 100);
    expect(low.status === 'ok' && low.dose).toBe(500);
    expect(high.status === 'ok' && high.dose).toBe(1000);
  });

  it('uses flat doses as given', () => {
    const result = calculator.calculate('Advil', 40, 80);
    expect(result).toMatchObject({ status: 'ok', drug_id: 'ibuprofen', dose: 400, clamped: false });
  });

  it('clamps to the maximum daily dose and adds pediatric caveats', () => {
    const result = calculator.calculate('ibuprofen', 12, 50);
    expect(result).toMatchObject({
      status: 'ok',
      dose: 400,
      clamped: true,
      caveats: [
        'Calculated dose of 500 mg exceeds the maximum daily dose; capped at 400 mg.',
        'Pediatric patient: dosing must be verified by a pediatrician.',
        DOSAGE_NOTICE,
      ],
    });
  });

  it('never exceeds the maximum daily dose inside a band', () => {
    for (const age of [18, 40, 80, 120]) {
      for (const weight of [50, 75, 100]) {
        const result = calculator.calculate('acetaminophen', age, weight);
        expect(result.status).toBe('ok');
        if (result.status === 'ok') {
          expect(result.dose).toBeLessThanOrEqual(result.rule.max_daily_dose);
        }
      }
    }
    for (const age of [6, 10, 17]) {
      for (const weight of [20, 40, 60]) {
        const result = calculator.calculate('ibuprofen', age, weight);
        expect(result.status === 'ok' && result.dose <= 400).toBe(true);
      }
    }
  });

  it('raises AmbiguousRuleError when overlapping rules both match', () => {
    const overlapping = new DosageCalculator(data.catalog, [
      ...MOCK_RULES,
      createMockRule({
        drug_id: 'acetaminophen',
        age_min: 18,
        age_max: 65,
        weight_min: 40,
        weight_max: 80,
        dose: { basis: 'per_kg', amount: 12 },
        max_daily_dose: 900,
      }),
    ]);

    expect(() => overlapping.calculate('acetaminophen', 30, 70)).toThrow(AmbiguousRuleError);
    try {
      overlapping.calculate('acetaminophen', 30, 70);
    } catch (error) {
      expect(error instanceof AmbiguousRuleError && error.matched_rules).toBe(2);
    }

    // Outside the overlap only one rule applies
    const result = overlapping.calculate('acetaminophen', 30, 90);
    expect(result.status === 'ok' && result.dose).toBe(900);
  });

  it('rejects out-of-range inputs', () => {
    expect(() => calculator.calculate('acetaminophen', -1, 70)).toThrow(InvalidInputError);
    expect(() => calculator.calculate('acetaminophen', 30, 0)).toThrow(InvalidInputError);
    expect(() => calculator.calculate('acetaminophen', Number.NaN, 70)).toThrow(InvalidInputError);
  });

  it('rejects unknown drugs', () => {
    expect(() => calculator.calculate('mystery pill', 30, 70)).toThrow(NotFoundError);
  });
});

describe('DosageCalculator.rulesFor', () => {
  it('returns every band for a drug', () => {
    expect(calculator.rulesFor('Advil')).toHaveLength(2);
    expect(calculator.rulesFor('warfarin')).toEqual([]);
  });
});

// ============================================================================
// Proposed dose checks
// ============================================================================

describe('DosageCalculator.checkDose', () => {
  it('reports a proposal above the maximum daily dose', () => {
    expect(calculator.checkDose('Advil', 40, 80, 1600)).toEqual({
      status: 'ok',
      drug_id: 'ibuprofen',
      drug_name: 'Ibuprofen',
      proposed_dose: 1600,
      max_daily_dose: 1200,
      recommended_dose: 400,
      unit: 'mg',
      within_limit: false,
      caveats: ['Proposed 1600 mg per day exceeds the maximum daily dose of 1200 mg by 400 mg.', DOSAGE_NOTICE],
    });
  });

  it('accepts a proposal at or under the limit and keeps pediatric caveats', () => {
    const result = calculator.checkDose('ibuprofen', 10, 30, 400);
    expect(result).toMatchObject({
      status: 'ok',
      within_limit: true,
      max_daily_dose: 400,
      recommended_dose: 300,
      caveats: [
        'Proposed 400 mg per day is within the maximum daily dose of 400 mg.',
        'Pediatric patient: dosing must be verified by a pediatrician.',
        DOSAGE_NOTICE,
      ],
    });
  });

  it('caps the recommended dose at the maximum', () => {
    const result = calculator.checkDose('ibuprofen', 12, 50, 200);
    expect(result.status === 'ok' && result.recommended_dose).toBe(400);
  });

  it('returns NoApplicableRule outside every band', () => {
    expect(calculator.checkDose('acetaminophen', 30, 150, 500)).toMatchObject({
      status: 'no_applicable_rule',
      drug_id: 'acetaminophen',
    });
  });

  it('raises AmbiguousRuleError inside overlapping bands', () => {
    const overlapping = new DosageCalculator(data.catalog, [
      ...MOCK_RULES,
      createMockRule({ drug_id: 'acetaminophen', age_min: 18, age_max: 65, weight_min: 40, weight_max: 80 }),
    ]);
    expect(() => overlapping.checkDose('acetaminophen', 30, 70, 500)).toThrow(AmbiguousRuleError);
  });

  it('rejects a non-positive proposal', () => {
    expect(() => calculator.checkDose('acetaminophen', 30, 70, 0)).toThrow(
      'Proposed dose must be a number greater than 0, got: 0'
    );
  });
});
