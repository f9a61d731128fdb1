/**
 * Pairwise drug interaction checks and single-drug safety profiles
 */

import { NO_INTERACTION_ON_RECORD } from '../config/defaults.js';
import { InvalidInputError } from '../domain/errors.js';
import { containsPhrase, normalizeText, pairKey, sortPair } from '../domain/ids.js';
import type {
  InteractionEntry,
  InteractionFinding,
  PatientHistory,
  ProductRecord,
  SafetyAlert,
  SafetyProfile,
  Severity,
} from '../domain/types.js';
import type { ProductCatalog } from '../catalog/catalog.js';

const SEVERITY_RANK: Record<Severity, number> = {
  severe: 0,
  moderate: 1,
  mild: 2,
  none: 3,
};

export function compareFindings(a: InteractionFinding, b: InteractionFinding): number {
  return (
    SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] ||
    pairKey(...a.drugs).localeCompare(pairKey(...b.drugs))
  );
}

/** True when either normalized phrase contains the other on word boundaries */
function phrasesOverlap(a: string, b: string): boolean {
  const left = normalizeText(a);
  const right = normalizeText(b);
  return containsPhrase(left, right) || containsPhrase(right, left);
}

/**
 * Match reported conditions against the product's contraindications and
 * reported allergies against its name, brands and active ingredients.
 */
export function assessPatient(product: ProductRecord, history: PatientHistory): SafetyAlert[] {
  const alerts: SafetyAlert[] = [];

  for (const condition of history.conditions ?? []) {
    const matched = product.contraindications.find((c) => phrasesOverlap(c, condition));
    if (matched !== undefined) {
      alerts.push({
        kind: 'contraindication',
        reported: condition,
        matched,
        description: `${product.name} is contraindicated with ${matched} (reported condition: ${condition}).`,
      });
    }
  }

  const identities = [product.name, ...product.brand_names, ...product.active_ingredients];
  for (const allergy of history.allergies ?? []) {
    const matched = identities.find((name) => phrasesOverlap(name, allergy));
    if (matched !== undefined) {
      alerts.push({
        kind: 'allergy',
        reported: allergy,
        matched,
        description: `Reported allergy to ${allergy} matches ${product.name} (${matched}).`,
      });
    }
  }

  return alerts;
}

export class InteractionChecker {
  private readonly table = new Map<string, InteractionEntry>();

  constructor(
    private readonly catalog: ProductCatalog,
    entries: readonly InteractionEntry[]
  ) {
    for (const entry of entries) {
      this.table.set(pairKey(...entry.drugs), entry);
    }
  }

  /**
   * Every unordered pair from the input set, most severe first. Pairs with no
   * entry are reported explicitly rather than left out.
   */
  check(drug_refs: Iterable<string>): InteractionFinding[] {
    const ids = [...new Set([...drug_refs].map((ref) => this.catalog.resolve(ref).id))].sort();

    if (ids.length < 2) {
      throw new InvalidInputError('At least two distinct drugs are required for an interaction check');
    }

    const findings: InteractionFinding[] = [];
    for (let i = 0; i < ids.length; i++) {
      for (let j = i + 1; j < ids.length; j++) {
        findings.push(this.findingFor(ids[i], ids[j]));
      }
    }

    return findings.sort(compareFindings);
  }

  /**
   * Contraindications, warnings and prescription status of one product, with
   * alerts for any reported condition or allergy it conflicts with.
   */
  profile(drug_ref: string, history: PatientHistory = {}): SafetyProfile {
    const product = this.catalog.resolve(drug_ref);
    return {
      drug_id: product.id,
      drug_name: product.name,
      prescription_required: product.prescription_required,
      contraindications: [...product.contraindications],
      warnings: [...product.warnings],
      alerts: assessPatient(product, history),
    };
  }

  private findingFor(a: string, b: string): InteractionFinding {
    const drugs = sortPair(a, b);
    const entry = this.table.get(pairKey(a, b));

    if (!entry) {
      return { drugs, severity: 'none', description: NO_INTERACTION_ON_RECORD, on_record: false };
    }

    return { drugs, severity: entry.severity, description: entry.description, on_record: true };
  }
}
