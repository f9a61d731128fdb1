/**
 * Keyword/rule-based intent classification
 *
 * Maps query text (plus optional patient context) to the set of specialists
 * to invoke. Never returns an empty set: search is the fallback.
 */

import { containsPhrase, normalizeText } from '../domain/ids.js';
import { isAdvisorError } from '../domain/errors.js';
import {
  PLAN_TIERS,
  SPECIALIST_ORDER,
  type PatientContext,
  type PlanTier,
  type SpecialistTag,
} from '../domain/types.js';
import type { ProductCatalog } from '../catalog/catalog.js';

export const INTENT_KEYWORDS = {
  dosage: ['dose', 'doses', 'dosage', 'dosing'],
  // Amount questions that only mean dosage when nothing points at cost
  quantity: ['how much', 'how many', 'how often'],
  safety: [
    'interaction', 'interactions', 'interact', 'safe', 'safety', 'side effect', 'side effects',
    'warning', 'warnings', 'contraindication', 'contraindications', 'together', 'combine', 'mix',
  ],
  coverage: [
    'insurance', 'insured', 'coverage', 'covered', 'cover', 'cost', 'costs', 'price', 'copay',
    'afford', 'cheaper', 'generic', 'plan',
  ],
  search: ['find', 'search', 'look for', 'show me', 'list', 'available', 'recommend'],
  alternatives: ['alternative', 'alternatives', 'substitute', 'instead of', 'similar to', 'replacement'],
} as const;

export interface Classification {
  /** Specialists to invoke, already in the fixed invocation order */
  specialists: SpecialistTag[];
  /** Drugs named in the query text, in order of appearance */
  drugs: string[];
  /** Query drugs followed by recognized current medications, deduplicated */
  medications: string[];
  /** Current medications that could not be matched to the catalog */
  unrecognized_medications: string[];
  plan_tier?: PlanTier;
  wants_alternatives: boolean;
  fallback: boolean;
}

function hasAny(text: string, phrases: readonly string[]): boolean {
  return phrases.some((phrase) => containsPhrase(text, phrase));
}

/**
 * Find catalog products named in normalized text. Longer phrases win, and a
 * matched span is masked so a shorter alias cannot match inside it.
 */
export function recognizeDrugs(text: string, catalog: ProductCatalog): string[] {
  let padded = ` ${text} `;
  const found: Array<{ position: number; product_id: string }> = [];

  for (const alias of catalog.aliases()) {
    const needle = ` ${alias.phrase} `;
    let position = padded.indexOf(needle);
    while (position !== -1) {
      found.push({ position, product_id: alias.product_id });
      const mask = ` ${'#'.repeat(alias.phrase.length)} `;
      padded = padded.slice(0, position) + mask + padded.slice(position + needle.length);
      position = padded.indexOf(needle);
    }
  }

  const ordered = found.sort((a, b) => a.position - b.position).map((f) => f.product_id);
  return [...new Set(ordered)];
}

export function recognizePlanTier(text: string): PlanTier | undefined {
  return PLAN_TIERS.find((tier) => containsPhrase(text, tier));
}

export function classifyQuery(
  query_text: string,
  catalog: ProductCatalog,
  context: PatientContext = {}
): Classification {
  const text = normalizeText(query_text);
  const drugs = recognizeDrugs(text, catalog);

  const unrecognized_medications: string[] = [];
  const context_drugs: string[] = [];
  for (const medication of context.current_medications ?? []) {
    try {
      context_drugs.push(catalog.resolve(medication).id);
    } catch (error) {
      if (!isAdvisorError(error)) throw error;
      unrecognized_medications.push(medication);
    }
  }
  const medications = [...new Set([...drugs, ...context_drugs])];

  const mentions_safety = hasAny(text, INTENT_KEYWORDS.safety);
  const mentions_coverage = hasAny(text, INTENT_KEYWORDS.coverage);
  const mentions_dosage =
    hasAny(text, INTENT_KEYWORDS.dosage) || (!mentions_coverage && hasAny(text, INTENT_KEYWORDS.quantity));
  const reports_history = (context.conditions?.length ?? 0) > 0 || (context.allergies?.length ?? 0) > 0;
  const wants_alternatives = drugs.length > 0 && hasAny(text, INTENT_KEYWORDS.alternatives);

  const selected = new Set<SpecialistTag>();

  if (drugs.length > 0 && mentions_dosage) {
    selected.add('dosage');
  }

  if (
    drugs.length >= 2 ||
    (medications.length >= 2 && (drugs.length > 0 || mentions_safety)) ||
    (drugs.length > 0 && (mentions_safety || reports_history))
  ) {
    selected.add('safety');
  }

  if (mentions_coverage) {
    selected.add('coverage');
  }

  if (hasAny(text, INTENT_KEYWORDS.search) || wants_alternatives) {
    selected.add('search');
  }

  const fallback = selected.size === 0;
  if (fallback) {
    selected.add('search');
  }

  return {
    specialists: SPECIALIST_ORDER.filter((tag) => selected.has(tag)),
    drugs,
    medications,
    unrecognized_medications,
    plan_tier: context.plan_tier ?? recognizePlanTier(text),
    wants_alternatives,
    fallback,
  };
}
