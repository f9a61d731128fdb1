/**
 * Request orchestrator
 *
 * Runs one query through received -> classified -> dispatched -> merged ->
 * disclaimed -> done. Specialists run in the fixed order safety, dosage,
 * coverage, search; a failing specialist becomes an error entry and never
 * stops the others.
 */

import { DISCLAIMER } from '../config/defaults.js';
import { InvalidInputError, NotFoundError, describeError, isAdvisorError } from '../domain/errors.js';
import type {
  AggregatedResponse,
  OrchestratorState,
  PatientContext,
  PatientHistory,
  SpecialistPayloads,
  SpecialistResult,
  SpecialistResultOf,
  SpecialistStatus,
  SpecialistTag,
} from '../domain/types.js';
import type { ProductCatalog } from '../catalog/catalog.js';
import type { LoadedDataset } from '../catalog/loader.js';
import { createLogger } from '../utils/log.js';
import { generateRequestId } from '../utils/hash.js';
import { classifyQuery, type Classification } from './classify.js';
import { CoverageAdvisor } from './coverage.js';
import { DosageCalculator } from './dosage.js';
import { InteractionChecker } from './interactions.js';
import { SearchEngine } from './search.js';

const logger = createLogger('orchestrator');

const NEXT_STATE: Record<OrchestratorState, OrchestratorState | null> = {
  received: 'classified',
  classified: 'dispatched',
  dispatched: 'merged',
  merged: 'disclaimed',
  disclaimed: 'done',
  done: null,
};

/**
 * Tracks the states one request has passed through and rejects skipped or
 * repeated transitions.
 */
export class RequestStateMachine {
  private readonly visited: OrchestratorState[] = ['received'];

  get current(): OrchestratorState {
    return this.visited[this.visited.length - 1];
  }

  advance(next: OrchestratorState): void {
    const expected = NEXT_STATE[this.current];
    if (expected !== next) {
      throw new Error(`Illegal orchestrator transition: ${this.current} -> ${next}`);
    }
    this.visited.push(next);
  }

  states(): OrchestratorState[] {
    return [...this.visited];
  }
}

export interface SpecialistOutput<S extends SpecialistTag> {
  status: SpecialistStatus;
  payload: SpecialistPayloads[S];
  confidence: number;
  caveats: string[];
}

export interface OrchestratorDeps {
  catalog: ProductCatalog;
  search: SearchEngine;
  dosage: DosageCalculator;
  interactions: InteractionChecker;
  coverage: CoverageAdvisor;
}

interface RequestInput {
  query: string;
  context: PatientContext;
  classification: Classification;
}

export class Orchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  static fromDataset(data: LoadedDataset): Orchestrator {
    return new Orchestrator({
      catalog: data.catalog,
      search: new SearchEngine(data.catalog),
      dosage: new DosageCalculator(data.catalog, data.dosage_rules),
      interactions: new InteractionChecker(data.catalog, data.interactions),
      coverage: new CoverageAdvisor(data.catalog, data.coverage),
    });
  }

  /** The catalog and specialists this orchestrator dispatches to */
  components(): OrchestratorDeps {
    return this.deps;
  }

  handle(query_text: string, patient_context: PatientContext = {}): AggregatedResponse {
    const request_id = generateRequestId();
    const machine = new RequestStateMachine();

    // Classified
    const classification = classifyQuery(query_text, this.deps.catalog, patient_context);
    machine.advance('classified');
    logger.debug(
      { request_id, specialists: classification.specialists, drugs: classification.drugs },
      'Query classified'
    );

    // Dispatched
    const input: RequestInput = { query: query_text, context: patient_context, classification };
    const results: SpecialistResult[] = [];
    for (const tag of classification.specialists) {
      results.push(this.invoke(tag, input, request_id));
    }
    machine.advance('dispatched');

    // Merged: results already sit in invocation order, one per specialist
    machine.advance('merged');

    // Disclaimed
    const disclaimer = DISCLAIMER;
    machine.advance('disclaimed');

    machine.advance('done');

    logger.info(
      {
        request_id,
        specialists: results.map((r) => `${r.specialist}:${r.status}`),
        fallback: classification.fallback,
      },
      'Query handled'
    );

    return {
      request_id,
      query: query_text,
      drugs: classification.drugs,
      results,
      disclaimer,
      states: machine.states(),
    };
  }

  private invoke(tag: SpecialistTag, input: RequestInput, request_id: string): SpecialistResult {
    switch (tag) {
      case 'safety':
        return this.contain('safety', request_id, () => this.runSafety(input));
      case 'dosage':
        return this.contain('dosage', request_id, () => this.runDosage(input));
      case 'coverage':
        return this.contain('coverage', request_id, () => this.runCoverage(input));
      case 'search':
        return this.contain('search', request_id, () => this.runSearch(input));
    }
  }

  /**
   * Run one specialist, turning any failure into an error entry whose caveat
   * carries the failure description.
   */
  private contain<S extends SpecialistTag>(
    tag: S,
    request_id: string,
    run: () => SpecialistOutput<S>
  ): SpecialistResultOf<S> {
    try {
      const output = run();
      return { specialist: tag, ...output };
    } catch (error) {
      const message = describeError(error);
      if (isAdvisorError(error)) {
        logger.warn({ request_id, specialist: tag, code: error.code, message }, 'Specialist reported an error');
      } else {
        logger.error({ request_id, specialist: tag, error: message }, 'Specialist failed unexpectedly');
      }
      return {
        specialist: tag,
        status: 'error',
        payload: null,
        confidence: 0,
        caveats: [isAdvisorError(error) ? message : `Unexpected failure: ${message}`],
      };
    }
  }

  private runSafety({ classification, context }: RequestInput): SpecialistOutput<'safety'> {
    const unrecognized = classification.unrecognized_medications.map(
      (medication) => `Current medication not found in catalog and not checked: ${medication}`
    );

    if (classification.medications.length === 0) {
      throw new InvalidInputError('No recognized drug to check for safety');
    }

    const history: PatientHistory = { conditions: context.conditions, allergies: context.allergies };

    if (classification.medications.length === 1) {
      const profile = this.deps.interactions.profile(classification.medications[0], history);
      const alerts = profile.alerts.map((a) => a.description);
      const on_record = profile.alerts.length + profile.contraindications.length + profile.warnings.length > 0;
      return {
        status: on_record ? 'ok' : 'no_result',
        payload: { findings: [], profiles: [profile] },
        confidence: on_record ? 1 : 0,
        caveats: on_record
          ? [...alerts, ...unrecognized]
          : [...unrecognized, `No contraindications or warnings on record for ${profile.drug_name}.`],
      };
    }

    const findings = this.deps.interactions.check(classification.medications);
    const profiles = classification.medications
      .map((id) => this.deps.interactions.profile(id, history))
      .filter((profile) => profile.alerts.length > 0);
    const on_record = findings.filter((f) => f.on_record).length;

    const caveats: string[] = [];
    if (findings.some((f) => f.severity === 'severe')) {
      caveats.push('Severe interaction on record: do not combine without consulting a physician or pharmacist.');
    }
    caveats.push(...profiles.flatMap((profile) => profile.alerts.map((a) => a.description)), ...unrecognized);
    if (on_record < findings.length) {
      caveats.push('Absence of a recorded interaction does not mean the combination is safe.');
    }

    return {
      status: on_record > 0 || profiles.length > 0 ? 'ok' : 'no_result',
      payload: { findings, profiles },
      confidence: on_record / findings.length,
      caveats,
    };
  }

  private runDosage({ classification, context }: RequestInput): SpecialistOutput<'dosage'> {
    if (context.age === undefined || context.weight === undefined) {
      throw new InvalidInputError('Patient age and weight are required for a dosage calculation');
    }

    const [drug_id, ...others] = classification.drugs;
    if (drug_id === undefined) {
      throw new NotFoundError('No recognized drug named in the query for a dosage calculation');
    }
    const outcome = this.deps.dosage.calculate(drug_id, context.age, context.weight);
    const caveats = [...outcome.caveats];
    if (others.length > 0) {
      caveats.unshift(`Dosage calculated for ${outcome.drug_name} only; ask separately for other drugs.`);
    }

    if (outcome.status === 'no_applicable_rule') {
      return { status: 'no_result', payload: outcome, confidence: 0, caveats };
    }
    return { status: 'ok', payload: outcome, confidence: 1, caveats };
  }

  private runCoverage({ classification }: RequestInput): SpecialistOutput<'coverage'> {
    const [product_id] = classification.drugs;
    if (product_id === undefined) {
      throw new NotFoundError('No recognized product named in the query for a coverage lookup');
    }
    if (classification.plan_tier === undefined) {
      throw new InvalidInputError(
        'An insurance plan tier (bronze, silver, gold or platinum) is required for a coverage lookup'
      );
    }

    const result = this.deps.coverage.lookup(product_id, classification.plan_tier);
    const caveats: string[] = [];
    if (result.prior_authorization) {
      caveats.push('Prior authorization may be required by the plan.');
    }
    if (result.generic_suggestion) {
      const { product, coverage_pct } = result.generic_suggestion;
      caveats.push(
        `Generic alternative ${product.name} is covered at ${coverage_pct}% on the ${result.plan_tier} plan.`
      );
    }
    caveats.push('Confirm exact coverage with your insurance provider.');

    return { status: 'ok', payload: result, confidence: 1, caveats };
  }

  private runSearch({ query, classification }: RequestInput): SpecialistOutput<'search'> {
    if (classification.wants_alternatives) {
      const [product_id] = classification.drugs;
      const hits = this.deps.search.alternatives(product_id);
      const name = this.deps.catalog.lookup(product_id).name;
      return {
        status: hits.length > 0 ? 'ok' : 'no_result',
        payload: { mode: 'alternatives', hits },
        confidence: hits.length > 0 ? hits[0].score : 0,
        caveats:
          hits.length > 0
            ? ['Alternatives may differ in dosing and side effects; discuss any switch with a clinician.']
            : [`No alternatives to ${name} in the same category.`],
      };
    }

    if (!query.trim()) {
      throw new InvalidInputError('Query text is empty');
    }

    const hits = this.deps.search.search(query);
    return {
      status: hits.length > 0 ? 'ok' : 'no_result',
      payload: { mode: 'text', hits },
      confidence: hits.length > 0 ? hits[0].score : 0,
      caveats: hits.length > 0 ? [] : [`No products matched "${query.trim()}".`],
    };
  }
}

/**
 * Attach text produced by the external rendering collaborator. The structured
 * results are left untouched.
 */
export function withNarrative(response: AggregatedResponse, narrative: string): AggregatedResponse {
  return { ...response, narrative };
}
