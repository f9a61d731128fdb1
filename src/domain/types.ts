/**
 * Core domain types for the medical product advisor
 */

// ============================================================================
// Dataset records (read-only after load)
// ============================================================================

export const SEVERITIES = ['none', 'mild', 'moderate', 'severe'] as const;

export type Severity = (typeof SEVERITIES)[number];

export const PLAN_TIERS = ['bronze', 'silver', 'gold', 'platinum'] as const;

export type PlanTier = (typeof PLAN_TIERS)[number];

export interface ProductRecord {
  id: string;
  name: string;
  category: string;
  active_ingredients: readonly string[];
  price: number;
  strengths: readonly string[];
  manufacturer: string;
  brand_names: readonly string[];
  prescription_required: boolean;
  indications: readonly string[];
  contraindications: readonly string[];
  warnings: readonly string[];
  description?: string;
}

export type DoseExpression =
  | { basis: 'per_kg'; amount: number }
  | { basis: 'flat'; amount: number };

export interface DosageRule {
  drug_id: string;
  age_min: number;
  age_max: number;
  weight_min: number;
  weight_max: number;
  dose: DoseExpression;
  max_daily_dose: number;
  unit: string;
  frequency?: string;
}

export interface InteractionEntry {
  drugs: [string, string];
  severity: Severity;
  description: string;
}

export interface CoverageRecord {
  product_id: string;
  plan_tier: PlanTier;
  coverage_pct: number;
  generic_alternative_id?: string;
  prior_authorization?: boolean;
}

export interface Dataset {
  categories: string[];
  products: ProductRecord[];
  dosage_rules: DosageRule[];
  interactions: InteractionEntry[];
  coverage: CoverageRecord[];
}

// ============================================================================
// Specialist outputs
// ============================================================================

export interface SearchFilters {
  category?: string;
  max_price?: number;
  min_price?: number;
  prescription_required?: boolean;
}

export interface SearchHit {
  product: ProductRecord;
  score: number;
}

export interface DosageResult {
  status: 'ok';
  drug_id: string;
  drug_name: string;
  dose: number;
  unit: string;
  clamped: boolean;
  rule: DosageRule;
  caveats: string[];
}

export interface NoApplicableRule {
  status: 'no_applicable_rule';
  drug_id: string;
  drug_name: string;
  age: number;
  weight: number;
  caveats: string[];
}

export type DosageOutcome = DosageResult | NoApplicableRule;

/** A proposed daily amount checked against the matching rule's limit */
export interface DoseCheckResult {
  status: 'ok';
  drug_id: string;
  drug_name: string;
  proposed_dose: number;
  max_daily_dose: number;
  recommended_dose: number;
  unit: string;
  within_limit: boolean;
  caveats: string[];
}

export type DoseCheckOutcome = DoseCheckResult | NoApplicableRule;

export interface InteractionFinding {
  drugs: [string, string];
  severity: Severity;
  description: string;
  on_record: boolean;
}

export interface SafetyAlert {
  kind: 'contraindication' | 'allergy';
  /** Condition or allergy as the patient reported it */
  reported: string;
  /** Contraindication, ingredient or name it matched */
  matched: string;
  description: string;
}

export interface SafetyProfile {
  drug_id: string;
  drug_name: string;
  prescription_required: boolean;
  contraindications: string[];
  warnings: string[];
  alerts: SafetyAlert[];
}

export interface PatientHistory {
  conditions?: string[];
  allergies?: string[];
}

export interface CoverageSuggestion {
  product: ProductRecord;
  coverage_pct: number;
  estimated_out_of_pocket: number;
}

export interface CoverageResult {
  product: ProductRecord;
  plan_tier: PlanTier;
  coverage_pct: number;
  estimated_out_of_pocket: number;
  prior_authorization: boolean;
  generic_suggestion: CoverageSuggestion | null;
}

// ============================================================================
// Orchestration
// ============================================================================

export type SpecialistTag = 'safety' | 'dosage' | 'coverage' | 'search';

/** Fixed invocation and merge order, highest risk first */
export const SPECIALIST_ORDER: readonly SpecialistTag[] = ['safety', 'dosage', 'coverage', 'search'];

export type SpecialistStatus = 'ok' | 'no_result' | 'error';

export interface SafetyPayload {
  findings: InteractionFinding[];
  profiles: SafetyProfile[];
}

export interface SearchPayload {
  mode: 'text' | 'alternatives';
  hits: SearchHit[];
}

export interface SpecialistPayloads {
  safety: SafetyPayload;
  dosage: DosageOutcome;
  coverage: CoverageResult;
  search: SearchPayload;
}

export type SpecialistResultOf<S extends SpecialistTag> = {
  specialist: S;
  status: SpecialistStatus;
  payload: SpecialistPayloads[S] | null;
  confidence: number;
  caveats: string[];
};

export type SpecialistResult = { [S in SpecialistTag]: SpecialistResultOf<S> }[SpecialistTag];

export interface PatientContext extends PatientHistory {
  age?: number;
  weight?: number;
  plan_tier?: PlanTier;
  current_medications?: string[];
}

export type OrchestratorState =
  | 'received'
  | 'classified'
  | 'dispatched'
  | 'merged'
  | 'disclaimed'
  | 'done';

export interface AggregatedResponse {
  request_id: string;
  query: string;
  drugs: string[];
  results: SpecialistResult[];
  disclaimer: string;
  states: OrchestratorState[];
  narrative?: string;
}
