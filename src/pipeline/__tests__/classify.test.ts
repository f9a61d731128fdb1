/**
 * Unit tests for intent classification
 */

import { describe, it, expect } from 'vitest';
import { classifyQuery, recognizeDrugs, recognizePlanTier } from '../classify.js';
import { createMockLoadedDataset, createMockProduct } from '../../__tests__/fixtures.js';

const { catalog } = createMockLoadedDataset();

const numbered = createMockLoadedDataset({
  categories: ['pain-relief'],
  products: [
    createMockProduct({ id: '1', name: 'Aspirin', active_ingredients: ['acetylsalicylic acid'] }),
    createMockProduct({ id: '2', name: 'Ibuprofen', active_ingredients: ['ibuprofen'] }),
  ],
  dosage_rules: [],
  interactions: [],
  coverage: [],
}).catalog;

describe('recognizeDrugs', () => {
  it('finds names and brands in order of appearance', () => {
    expect(recognizeDrugs('coumadin and aspirin together', catalog)).toEqual(['warfarin', 'aspirin']);
  });

  it('reports each product once', () => {
    expect(recognizeDrugs('warfarin sodium is warfarin', catalog)).toEqual(['warfarin']);
  });

  it('lets a product name claim its phrase before a shared ingredient', () => {
    expect(recognizeDrugs('zestril or lisinopril', catalog)).toEqual(['zestril', 'lisinopril']);
  });

  it('ignores numbers that happen to be product identifiers', () => {
    expect(recognizeDrugs('aspirin dose for my 2 year old', numbered)).toEqual(['1']);
    expect(recognizeDrugs('1 or 2 tablets', numbered)).toEqual([]);
    expect(numbered.resolve('2').name).toBe('Ibuprofen');
  });

  it('matches whole words only', () => {
    expect(recognizeDrugs('aspirins', catalog)).toEqual([]);
  });
});

describe('recognizePlanTier', () => {
  it('finds a tier named in the text', () => {
    expect(recognizePlanTier('is it covered on my gold plan')).toBe('gold');
    expect(recognizePlanTier('goldfish')).toBeUndefined();
  });
});

describe('classifyQuery', () => {
  it('routes two named drugs to safety', () => {
    const result = classifyQuery('Check interaction between aspirin and warfarin', catalog);
    expect(result.specialists).toEqual(['safety']);
    expect(result.drugs).toEqual(['aspirin', 'warfarin']);
    expect(result.fallback).toBe(false);
  });

  it('routes a drug plus dose vocabulary to dosage', () => {
    expect(classifyQuery('How much acetaminophen for my child?', catalog).specialists).toEqual(['dosage']);
  });

  it('orders multiple intents safety, dosage, coverage', () => {
    const result = classifyQuery('What dose of ibuprofen is safe with warfarin, and is it covered?', catalog);
    expect(result.specialists).toEqual(['safety', 'dosage', 'coverage']);
    expect(result.drugs).toEqual(['ibuprofen', 'warfarin']);
  });

  it('routes a cost question with amount wording to coverage only', () => {
    const result = classifyQuery('How much does zestril cost on the gold plan?', catalog);
    expect(result.specialists).toEqual(['coverage']);
    expect(classifyQuery('how many doses of zestril are covered', catalog).specialists).toEqual([
      'dosage',
      'coverage',
    ]);
  });

  it('keeps numeric-id drugs out of safety unless named', () => {
    const result = classifyQuery('aspirin dose for my 2 year old', numbered);
    expect(result.specialists).toEqual(['dosage']);
    expect(result.drugs).toEqual(['1']);
  });

  it('routes a drug to safety when the patient reports conditions or allergies', () => {
    expect(classifyQuery('can I take warfarin', catalog, { conditions: ['pregnancy'] }).specialists).toEqual([
      'safety',
    ]);
    expect(classifyQuery('can I take warfarin', catalog).specialists).toEqual(['search']);
  });

  it('routes one drug plus safety vocabulary to safety', () => {
    expect(classifyQuery('is warfarin safe', catalog).specialists).toEqual(['safety']);
  });

  it('counts current medications toward safety', () => {
    const result = classifyQuery('can I take ibuprofen', catalog, {
      current_medications: ['Coumadin', 'Mystery Pill'],
    });
    expect(result.specialists).toEqual(['safety']);
    expect(result.medications).toEqual(['ibuprofen', 'warfarin']);
    expect(result.unrecognized_medications).toEqual(['Mystery Pill']);
  });

  it('routes cost vocabulary to coverage and reads the tier from the text', () => {
    const result = classifyQuery('is zestril covered on the gold plan', catalog);
    expect(result.specialists).toEqual(['coverage']);
    expect(result.plan_tier).toBe('gold');
  });

  it('prefers the tier from the patient context', () => {
    const result = classifyQuery('is zestril covered on the gold plan', catalog, { plan_tier: 'silver' });
    expect(result.plan_tier).toBe('silver');
  });

  it('routes explicit search vocabulary to search', () => {
    const result = classifyQuery('find pain relief', catalog);
    expect(result.specialists).toEqual(['search']);
    expect(result.fallback).toBe(false);
  });

  it('routes alternatives requests for a named drug to search', () => {
    const result = classifyQuery('alternatives to advil', catalog);
    expect(result.specialists).toEqual(['search']);
    expect(result.wants_alternatives).toBe(true);
    expect(result.drugs).toEqual(['ibuprofen']);
  });

  it('falls back to search when nothing else matches', () => {
    const result = classifyQuery('hello there', catalog);
    expect(result.specialists).toEqual(['search']);
    expect(result.fallback).toBe(true);
  });
});
